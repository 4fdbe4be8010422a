/**
 * Live-update page served to plain HTTP requests by the file monitor.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * HTML document showing `content`; its script reconnects to the same host and
 * port and replaces the text with every pushed message.
 */
export function renderMonitorPage(content: string, title = 'File Monitor'): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { margin: 0; display: flex; align-items: center; justify-content: center; min-height: 100vh; background: #f7f7f7; font-family: Arial, sans-serif; }
    .container { width: 80%; max-width: 800px; text-align: center; }
    pre { background: #eee; padding: 20px; border: 1px solid #ccc; overflow: auto; text-align: left; }
  </style>
</head>
<body>
  <div class="container">
    <h1>${escapeHtml(title)}</h1>
    <pre id="content">${escapeHtml(content)}</pre>
  </div>
  <script>
    const ws = new WebSocket('ws://' + location.host);
    ws.onmessage = (e) => { document.getElementById('content').textContent = e.data; };
  </script>
</body>
</html>
`;
}

/**
 * Complete `200 OK` response around an HTML body.
 */
export function htmlResponse(body: string): string {
  return (
    'HTTP/1.1 200 OK\r\n' +
    'Content-Type: text/html; charset=utf-8\r\n' +
    `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n` +
    'Connection: close\r\n' +
    '\r\n' +
    body
  );
}
