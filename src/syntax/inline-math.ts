import { GFM, parser as commonmarkParser, type MarkdownConfig } from '@lezer/markdown';

const DOLLAR = 36;
const BACKSLASH = 92;
const NEWLINE = 10;

/**
 * `$...$` inline math. A `$$` run never opens or closes inline math, so
 * display blocks are left to the text detector. The span may not cross a
 * line break and `\$` inside it does not close it.
 */
export const InlineMath: MarkdownConfig = {
  defineNodes: ['InlineMath', 'InlineMathMark'],
  parseInline: [{
    name: 'InlineMath',
    parse(cx, next, pos) {
      if (next !== DOLLAR || cx.char(pos + 1) === DOLLAR || cx.char(pos - 1) === DOLLAR) return -1;
      for (let i = pos + 1; i < cx.end; i++) {
        const ch = cx.char(i);
        if (ch === NEWLINE) return -1;
        if (ch === BACKSLASH && cx.char(i + 1) !== NEWLINE) { i++; continue; }
        if (ch !== DOLLAR) continue;
        if (cx.char(i + 1) === DOLLAR) return -1;
        return cx.addElement(cx.elt('InlineMath', pos, i + 1, [
          cx.elt('InlineMathMark', pos, pos + 1),
          cx.elt('InlineMathMark', i, i + 1),
        ]));
      }
      return -1;
    },
    before: 'Emphasis',
  }],
};

/**
 * CommonMark + GFM + inline math, for building trees outside an editor.
 * Inside the editor `markdownLanguage` already carries GFM.
 */
export const markdownParser = commonmarkParser.configure([GFM, InlineMath]);
