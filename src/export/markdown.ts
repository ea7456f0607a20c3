import TurndownService from 'turndown';

export type MarkdownConverter = (html: string) => string;

/**
 * Build the HTML to Markdown converter used for task bodies.
 */
export function createMarkdownConverter(): MarkdownConverter {
  const service = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    emDelimiter: '_',
    strongDelimiter: '**',
  });
  // Outlook bodies carry a <head> with a <style> block
  service.remove(['style', 'script', 'head', 'title']);

  return (html) => service.turndown(html);
}

/**
 * Tidy converter output: drop lines holding only emphasis markers or
 * underscore rules, strip trailing whitespace, collapse blank runs.
 *
 * Line removal runs before the newline collapse so the lines it empties
 * collapse too.
 */
export function cleanMarkdown(content: string): string {
  return content
    .replace(/^\s*(\*\*|__)\s*$/gm, '')
    .replace(/^\s*(\*\*|_)\s*$/gm, '')
    .replace(/^\s*_{2,}\s*$/gm, '')
    .replace(/[^\S\r\n]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
