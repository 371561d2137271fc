/**
 * HTML pages shown in the browser after the provider redirects back.
 *
 * @module oauth/pages
 */

/**
 * Escapes HTML special characters to prevent XSS attacks.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

const STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      height: 100vh;
      margin: 0;
      background: #f5f5f5;
    }
    .container {
      text-align: center;
      padding: 40px;
      max-width: 420px;
      background: white;
      border-radius: 8px;
      box-shadow: 0 2px 10px rgba(0,0,0,0.1);
    }
    .ok { color: #22c55e; margin-bottom: 10px; }
    .fail { color: #ef4444; margin-bottom: 10px; }
    p { color: #666; }
    .error { font-family: monospace; background: #fee; padding: 10px; border-radius: 4px; }`;

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${title}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
}

/**
 * Page for a callback that carried an authorization code.
 */
export function successPage(): string {
  return page(
    "Authentication Successful",
    `    <h1 class="ok">✓ Authentication Successful</h1>
    <p>You can close this window and return to the terminal.</p>`,
  );
}

/**
 * Page for a rejected, forged or incomplete callback.
 *
 * @param error - Short error label
 * @param description - Optional detail shown after the label
 */
export function errorPage(error: string, description?: string): string {
  const detail = description
    ? `${escapeHtml(error)}: ${escapeHtml(description)}`
    : escapeHtml(error);

  return page(
    "Authentication Failed",
    `    <h1 class="fail">✗ Authentication Failed</h1>
    <p class="error">${detail}</p>
    <p>Please close this window and try again from the terminal.</p>`,
  );
}

/**
 * Page for a repeated callback after the flow already has its result.
 */
export function alreadyCompletedPage(): string {
  return page(
    "Authentication Already Completed",
    `    <h1>Authentication already completed</h1>
    <p>This sign-in request has already been handled. You can close this window.</p>`,
  );
}
