/**
 * 标点恢复：preserve 的逆操作
 *
 *   ['hello', 'my world'], [(0, ', ', Middle), (0, '!', End)] -> ['hello, my world!']
 *
 * 以两个游标（chunk / mark）加输出行计数 num 迭代推进，不做递归。
 * 调用方负责保证 chunk 的数量与顺序和 preserve 输出一致；不一致时按兜底分支降级，不抛错。
 */

import { MarkRecord, toList } from './punctuation-types';

export function restoreLines(text: string | readonly string[], marks: readonly MarkRecord[]): string[] {
  const pending = toList(text);
  const output: string[] = [];
  let cursor = 0;
  let markCursor = 0;
  let num = 0;

  while (markCursor < marks.length) {
    // chunk 已用完：剩余标点拼成最后一行
    if (cursor >= pending.length) {
      output.push(marks.slice(markCursor).map((m) => m.mark).join(''));
      return output;
    }

    const current = marks[markCursor];
    if (current.lineIndex !== num) {
      output.push(pending[cursor]);
      cursor += 1;
      num += 1;
      continue;
    }

    const head = pending[cursor].trimEnd();
    pending[cursor] = head;
    markCursor += 1;

    switch (current.position) {
      case 'Begin':
        pending[cursor] = current.mark + head;
        break;
      case 'End':
        output.push(head + current.mark);
        cursor += 1;
        num += 1;
        break;
      case 'Alone':
        output.push(current.mark);
        num += 1;
        break;
      case 'Middle':
        if (cursor + 1 < pending.length) {
          cursor += 1;
          pending[cursor] = head + current.mark + pending[cursor];
        } else {
          // 中间标点后半段没有对应 chunk（未被下游处理），直接接在末尾
          pending[cursor] = head + current.mark;
        }
        break;
    }
  }

  return output.concat(pending.slice(cursor));
}
