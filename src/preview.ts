/**
 * HTML preview of a converted post, for checking that embedded images render
 * in a browser. Only images and fenced code blocks are converted.
 */

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function convertPreviewBody(markdown: string): string {
  return markdown
    .replace(
      /!\[([^\]]*)\]\((data:image\/[^)]+)\)/g,
      '<img src="$2" alt="$1" style="max-width: 100%; height: auto;">'
    )
    .replace(/```\w*\n([\s\S]*?)\n```/g, "<pre><code>$1</code></pre>");
}

export function createPreviewHtml(markdown: string, name: string): string {
  const title = escapeHtml(name);
  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>Preview: ${title}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Helvetica, Arial, sans-serif;
            max-width: 900px;
            margin: 40px auto;
            padding: 20px;
            line-height: 1.6;
        }
        img {
            max-width: 100%;
            height: auto;
            border: 1px solid #ddd;
            margin: 20px 0;
        }
        pre {
            background: #f6f8fa;
            padding: 16px;
            overflow: auto;
            border-radius: 6px;
        }
        code {
            font-family: 'Courier New', monospace;
        }
    </style>
</head>
<body>
    <h1>Preview: ${title}</h1>
    <hr>
    ${convertPreviewBody(markdown)}
</body>
</html>
`;
}
