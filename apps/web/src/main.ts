import { asDisplayError, formatSource, resolveOptions, type LangOptions } from '@chip8asm/lang-chip8';

import { reindentAt, smartHomeAt, type EditorState } from './editor.js';
import { renderHighlightedSource } from './highlight.js';

const SAMPLE = `;;; bouncing sprite
start:  CLS
        LD I, sprite
        LD V0, #10
        LD V1, 8
loop: DRW V0, V1, 5
  ADD V0, 1
        SE VF, 0 ; collision?
        JP start
 JP loop
sprite: DB $11110000, #90, #90, #90, #F0
`;

const source = document.querySelector<HTMLTextAreaElement>('#source');
const preview = document.querySelector<HTMLElement>('#preview');
const columnInput = document.querySelector<HTMLInputElement>('#column');
const formatButton = document.querySelector<HTMLButtonElement>('#format');
const status = document.querySelector<HTMLElement>('#status');

if (!source || !preview || !columnInput || !formatButton || !status) {
  throw new Error('UI initialization failed: missing required element');
}

let options: LangOptions = resolveOptions();

function render(): void {
  if (!source || !preview) {
    return;
  }
  // 末尾改行のみの行も高さを確保する。
  preview.innerHTML = `${renderHighlightedSource(source.value)}\n`;
}

function applyState(state: EditorState): void {
  if (!source) {
    return;
  }
  source.value = state.value;
  source.setSelectionRange(state.cursor, state.cursor);
  render();
}

function setStatus(message: string): void {
  if (status) {
    status.textContent = message;
  }
}

source.addEventListener('input', render);
source.addEventListener('scroll', () => {
  preview.scrollTop = source.scrollTop;
  preview.scrollLeft = source.scrollLeft;
});

source.addEventListener('keydown', (event) => {
  if (event.key === 'Tab' && !event.shiftKey) {
    event.preventDefault();
    applyState(reindentAt({ value: source.value, cursor: source.selectionStart }, options));
    return;
  }
  if (event.key === 'Home' && !event.shiftKey) {
    event.preventDefault();
    applyState(smartHomeAt({ value: source.value, cursor: source.selectionStart }));
  }
});

columnInput.value = String(options.instructionColumn);
columnInput.addEventListener('change', () => {
  try {
    options = resolveOptions({ instructionColumn: Number(columnInput.value) });
    setStatus(`Instruction column: ${options.instructionColumn}`);
  } catch (error) {
    setStatus(asDisplayError(error));
    columnInput.value = String(options.instructionColumn);
  }
});

formatButton.addEventListener('click', () => {
  applyState({ value: formatSource(source.value, options), cursor: 0 });
  setStatus('Formatted');
});

source.value = SAMPLE;
render();
setStatus('Tab: re-indent line / Home: instruction column');
