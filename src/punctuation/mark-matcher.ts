/**
 * MarkMatcher - 标点匹配规则
 * 把「可选空白 + 一个或多个标点 + 可选空白」的最长连续片段当作一个标点单元
 */

import { InvalidConfigurationError, describeValue } from './punctuation-errors';
import { RESERVED_ESCAPE_TOKENS } from './digit-escape';
import { MarkUnit } from './punctuation-types';

// 字符类内部需要转义的字符
const CLASS_SPECIAL_RE = /[\\\]\[^-]/g;

/**
 * 去重后的标点集合（按首次出现顺序，按码点拆分）
 */
export function collapseMarks(marks: unknown): string {
  if (typeof marks !== 'string') {
    throw new InvalidConfigurationError('punctuation marks must be defined as a string', describeValue(marks));
  }
  const unique = [...new Set(Array.from(marks))];
  if (unique.length === 0) {
    throw new InvalidConfigurationError('punctuation marks must not be empty', 'empty string');
  }
  const reserved = unique.filter((c) => RESERVED_ESCAPE_TOKENS.includes(c));
  if (reserved.length > 0) {
    throw new InvalidConfigurationError(
      'punctuation marks must not contain reserved escape characters',
      reserved.map((c) => `U+${(c.codePointAt(0) ?? 0).toString(16).toUpperCase()}`).join(', ')
    );
  }
  return unique.join('');
}

export class MarkMatcher {
  readonly marks: string;
  private readonly pattern: RegExp;

  constructor(marks: string) {
    this.marks = collapseMarks(marks);
    const escaped = this.marks.replace(CLASS_SPECIAL_RE, (c) => `\\${c}`);
    this.pattern = new RegExp(`(\\s*[${escaped}]+\\s*)+`, 'gu');
  }

  /**
   * 每个标点单元替换为一个空格，再去掉首尾空白；输入类型与输出类型一致
   */
  remove(text: string): string;
  remove(text: readonly string[]): string[];
  remove(text: string | readonly string[]): string | string[];
  remove(text: string | readonly string[]): string | string[] {
    if (typeof text === 'string') return this.removeLine(text);
    return text.map((line) => this.removeLine(line));
  }

  /**
   * 按从左到右顺序返回互不重叠的标点单元
   */
  detect(line: string): MarkUnit[] {
    // 每次使用新的 RegExp，避免共享 lastIndex
    const re = new RegExp(this.pattern);
    const units: MarkUnit[] = [];
    let match: RegExpExecArray | null;
    while ((match = re.exec(line)) !== null) {
      units.push({ text: match[0], start: match.index, end: match.index + match[0].length });
    }
    return units;
  }

  private removeLine(line: string): string {
    return line.replace(this.pattern, ' ').trim();
  }
}

export function createMarkMatcher(marks: string): MarkMatcher {
  return new MarkMatcher(marks);
}
