import { describe, expect, it } from 'vitest';

import { escapeHtml, renderHighlightedLine, renderHighlightedSource } from './highlight.js';

describe('highlight rendering', () => {
  it('wraps every token in a category span', () => {
    expect(renderHighlightedLine('loop: LD V0, #FF ; a<b')).toBe(
      '<span class="tok-label">loop</span>: ' +
        '<span class="tok-operation">LD</span> ' +
        '<span class="tok-register">V0</span>, ' +
        '<span class="tok-number">#FF</span> ' +
        '<span class="tok-comment">; a&lt;b</span>'
    );
  });

  it('escapes text between tokens', () => {
    expect(escapeHtml('a & "b"')).toBe('a &amp; &quot;b&quot;');
    expect(renderHighlightedLine('  <>')).toBe('  &lt;&gt;');
  });

  it('renders each source line separately', () => {
    expect(renderHighlightedSource('CLS\r\nx')).toBe(
      '<span class="tok-operation">CLS</span>\n<span class="tok-identifier">x</span>'
    );
  });
});
