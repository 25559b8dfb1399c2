/**
 * HTML document builder for the rendered message body
 */

const HTML_HEAD = `<!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.01 Transitional//EN"
    "http://www.w3.org/TR/html4/loose.dtd">
<html>
<head>
<meta http-equiv="content-type" content="text/html; charset=UTF-8">
<style type="text/css">
#plaintext {
    font-family: Fixedsys, Courier, monospace;
    padding: 10px;
    white-space: pre-wrap;
}
</style>
</head>
<body>
`;

const HTML_FOOT = `</body>
</html>
`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Wrap plain text in a preformatted block
 */
export function preformat(text: string): string {
  return `<pre id="plaintext">\n${escapeHtml(text)}</pre>\n`;
}

export class HtmlDocument {
  private body = '';

  /** Plain text, escaped and preformatted */
  addText(text: string): void {
    this.body += preformat(text);
  }

  /** Markup, inserted as is */
  addHtml(html: string): void {
    this.body += html;
  }

  render(): string {
    return HTML_HEAD + this.body + HTML_FOOT;
  }
}
