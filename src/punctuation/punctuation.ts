/**
 * Punctuation - 标点保留/去除入口
 *
 * 下游引擎对标点的处理各不相同：有的静默丢弃，有的直接报错。
 * 这里先把标点从文本中「藏起来」交给下游，处理完再按原位置放回。
 */

import { LRUCache } from 'lru-cache';
import { MarkMatcher, collapseMarks } from './mark-matcher';
import { preserveLines } from './punctuation-preserver';
import { restoreLines } from './punctuation-restorer';
import { MarkRecord, MarkUnit, PreservedText } from './punctuation-types';

/** 默认处理的标点 */
export const DEFAULT_MARKS = ';:,.!?¡¿—…"«»“”';

const MATCHER_CACHE_SIZE = 32;

export class Punctuation {
  private readonly matcher: MarkMatcher;

  constructor(marks: string) {
    this.matcher = new MarkMatcher(marks);
  }

  static defaultMarks(): string {
    return DEFAULT_MARKS;
  }

  /** 去重后的标点集合 */
  get marks(): string {
    return this.matcher.marks;
  }

  /** 换一套标点，返回新实例（实例本身不可变） */
  withMarks(marks: string): Punctuation {
    return configure(marks);
  }

  remove(text: string): string;
  remove(text: readonly string[]): string[];
  remove(text: string | readonly string[]): string | string[];
  remove(text: string | readonly string[]): string | string[] {
    return this.matcher.remove(text);
  }

  detect(line: string): MarkUnit[] {
    return this.matcher.detect(line);
  }

  preserve(text: string | readonly string[]): PreservedText {
    return preserveLines(this.matcher, text);
  }

  restore(text: string | readonly string[], marks: readonly MarkRecord[]): string[] {
    return restoreLines(text, marks);
  }
}

// 实例不可变，可按标点集合共享
const instances = new LRUCache<string, Punctuation>({ max: MATCHER_CACHE_SIZE });

/**
 * 按标点集合获取（或构建）Punctuation；非字符串或空集合抛 InvalidConfigurationError
 */
export function configure(marks: string): Punctuation {
  const key = collapseMarks(marks);
  const cached = instances.get(key);
  if (cached) return cached;
  const punctuation = new Punctuation(key);
  instances.set(key, punctuation);
  return punctuation;
}

/** 恢复与标点集合无关 */
export const restore = restoreLines;
