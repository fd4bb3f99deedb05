/**
 * 数字保护：夹在两个数字之间的 , 与 . 在检测标点前替换为保留字符，
 * 避免 3,14 / 2.5 之类的小数、千分位被当作标点切开。
 * 数字按 Unicode 十进制数字（\p{Nd}）判断，٣.١٤ 之类同样受保护。
 * 保留字符取自 Unicode 私用区，不允许出现在标点集合中。
 * 限制：unescape 会还原 chunk 中所有保留字符，输入里原本就有的 U+E000 / U+E001
 * 也会变成 , / .
 */

export enum EscapeToken {
  Comma = '\uE000',
  Period = '\uE001',
}

/** 私用区保留字符，不允许出现在标点集合中 */
export const RESERVED_ESCAPE_TOKENS: readonly string[] = [EscapeToken.Comma, EscapeToken.Period];

const DIGIT_COMMA_RE = /(?<=\p{Nd}),(?=\p{Nd})/gu;
const DIGIT_PERIOD_RE = /(?<=\p{Nd})\.(?=\p{Nd})/gu;
const ESCAPED_COMMA_RE = new RegExp(EscapeToken.Comma, 'g');
const ESCAPED_PERIOD_RE = new RegExp(EscapeToken.Period, 'g');

export function escapeDigitSeparators(line: string): string {
  return line.replace(DIGIT_COMMA_RE, EscapeToken.Comma).replace(DIGIT_PERIOD_RE, EscapeToken.Period);
}

export function unescapeDigitSeparators(chunk: string): string {
  return chunk.replace(ESCAPED_COMMA_RE, ',').replace(ESCAPED_PERIOD_RE, '.');
}
