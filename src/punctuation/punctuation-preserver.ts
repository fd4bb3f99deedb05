/**
 * 标点保留：把若干行拆成无标点的 chunk 列表 + 带位置的标点记录
 *
 *   'hello, my world!' -> ['hello', 'my world'], [(0, ', ', Middle), (0, '!', End)]
 *
 * 空 chunk 直接丢弃，不占用恢复时的位置。
 */

import { MarkMatcher } from './mark-matcher';
import { escapeDigitSeparators, unescapeDigitSeparators } from './digit-escape';
import {
  MarkPosition,
  MarkRecord,
  MarkUnit,
  PreservedText,
  createMarkRecord,
  toList,
} from './punctuation-types';

interface PreservedLine {
  chunks: string[];
  marks: MarkRecord[];
}

export function preserveLines(matcher: MarkMatcher, text: string | readonly string[]): PreservedText {
  const chunks: string[] = [];
  const marks: MarkRecord[] = [];

  toList(text).forEach((line, lineIndex) => {
    const preserved = preserveLine(matcher, line, lineIndex);
    chunks.push(...preserved.chunks);
    marks.push(...preserved.marks);
  });

  return { chunks: chunks.filter((chunk) => chunk.length > 0), marks };
}

function preserveLine(matcher: MarkMatcher, rawLine: string, lineIndex: number): PreservedLine {
  const line = escapeDigitSeparators(rawLine);
  const units = matcher.detect(line);
  if (units.length === 0) {
    return { chunks: [unescapeDigitSeparators(line)], marks: [] };
  }

  // 整行只有标点
  if (units.length === 1 && units[0].text === line) {
    return { chunks: [], marks: [createMarkRecord(lineIndex, line, 'Alone')] };
  }

  const marks = units.map((unit, i) =>
    createMarkRecord(lineIndex, unit.text, classifyPosition(unit, i, units.length, line.length))
  );

  // 按标点位置切分：prefix0, m1, prefix1, ..., mk, suffixk，只保留文本部分
  const chunks: string[] = [];
  let offset = 0;
  for (const unit of units) {
    chunks.push(line.slice(offset, unit.start));
    offset = unit.end;
  }
  chunks.push(line.slice(offset));

  return { chunks: chunks.map(unescapeDigitSeparators), marks };
}

function classifyPosition(unit: MarkUnit, index: number, count: number, lineLength: number): MarkPosition {
  if (index === 0 && unit.start === 0) return 'Begin';
  if (index === count - 1 && unit.end === lineLength) return 'End';
  return 'Middle';
}
