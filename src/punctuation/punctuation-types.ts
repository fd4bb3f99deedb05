/**
 * 标点保留/恢复相关类型
 */

/**
 * 标点在所属行中的位置
 * - Begin: 行首（第一个匹配且行以它开头）
 * - End: 行尾（最后一个匹配且行以它结尾）
 * - Middle: 行中
 * - Alone: 整行只有标点
 */
export type MarkPosition = 'Begin' | 'End' | 'Middle' | 'Alone';

/** 单次匹配得到的标点片段（仅在匹配过程中存在） */
export interface MarkUnit {
  text: string;  // 匹配到的原文，包含两侧空白
  start: number;  // 起始偏移（含）
  end: number;  // 结束偏移（不含）
}

/** preserve 产出、restore 消费的标点记录，按原顺序排列 */
export interface MarkRecord {
  readonly lineIndex: number;  // 所属输入行下标（不是 chunk 下标）
  readonly mark: string;
  readonly position: MarkPosition;
}

export interface PreservedText {
  chunks: string[];  // 非空、无标点的文本片段
  marks: MarkRecord[];
}

/** 单行字符串视为只有一行的列表 */
export function toList(text: string | readonly string[]): string[] {
  return typeof text === 'string' ? [text] : [...text];
}

export function createMarkRecord(lineIndex: number, mark: string, position: MarkPosition): MarkRecord {
  return Object.freeze({ lineIndex, mark, position });
}
