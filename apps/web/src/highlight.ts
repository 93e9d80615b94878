import { tokenizeLine } from '@chip8asm/lang-chip8';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

// トークン以外の文字はそのまま (エスケープのみ) 出力する。
export function renderHighlightedLine(line: string): string {
  let html = '';
  let position = 0;
  for (const token of tokenizeLine(line, { comments: true })) {
    html += escapeHtml(line.slice(position, token.start));
    html += `<span class="tok-${token.category}">${escapeHtml(token.text)}</span>`;
    position = token.end;
  }
  return html + escapeHtml(line.slice(position));
}

export function renderHighlightedSource(source: string): string {
  return source.split(/\r?\n/).map(renderHighlightedLine).join('\n');
}
