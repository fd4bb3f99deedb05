/**
 * restoreLines 单元测试
 */

import { restoreLines } from './punctuation-restorer';
import { MarkRecord, createMarkRecord } from './punctuation-types';

describe('restoreLines', () => {
  it('应该把 Middle 和 End 标点放回原位', () => {
    const marks: MarkRecord[] = [
      createMarkRecord(0, ', ', 'Middle'),
      createMarkRecord(0, '!', 'End'),
    ];
    expect(restoreLines(['hello', 'my world'], marks)).toEqual(['hello, my world!']);
  });

  it('没有标点的行应该原样输出', () => {
    const marks = [createMarkRecord(1, '!', 'End')];
    expect(restoreLines(['NO MARKS HERE', 'WOW'], marks)).toEqual(['NO MARKS HERE', 'WOW!']);
    expect(restoreLines(['x', 'y', 'z'], [createMarkRecord(2, '?', 'End')])).toEqual(['x', 'y', 'z?']);
  });

  it('没有标点记录时返回原 chunk', () => {
    expect(restoreLines(['a', 'b'], [])).toEqual(['a', 'b']);
  });

  it('Begin 标点应该接在同一行的 chunk 前面', () => {
    const marks = [createMarkRecord(0, '¿', 'Begin'), createMarkRecord(0, '?', 'End')];
    expect(restoreLines(['QUÉ TAL'], marks)).toEqual(['¿QUÉ TAL?']);
  });

  it('Alone 标点应该单独成行且不消耗 chunk', () => {
    const marks = [createMarkRecord(0, '.', 'End'), createMarkRecord(1, '!!', 'Alone')];
    expect(restoreLines(['ONE', 'TWO'], marks)).toEqual(['ONE.', '!!', 'TWO']);
  });

  it('chunk 用完后剩余标点拼成最后一行', () => {
    expect(restoreLines([], [createMarkRecord(0, '...', 'Alone')])).toEqual(['...']);

    const marks = [
      createMarkRecord(0, '!', 'End'),
      createMarkRecord(1, '?', 'End'),
      createMarkRecord(2, '.', 'Alone'),
    ];
    expect(restoreLines(['a'], marks)).toEqual(['a!', '?.']);
  });

  it('接标点前应该去掉 chunk 尾部空白', () => {
    const marks = [createMarkRecord(0, ', ', 'Middle')];
    expect(restoreLines(['hello  ', 'world'], marks)).toEqual(['hello, world']);
  });

  it('Middle 标点缺少后半段时接在末尾', () => {
    const marks = [createMarkRecord(0, ', ', 'Middle'), createMarkRecord(0, '!', 'End')];
    expect(restoreLines(['hello'], marks)).toEqual(['hello,!']);
  });

  it('多余的 chunk 应该原样保留', () => {
    expect(restoreLines(['a', 'b', 'c'], [createMarkRecord(0, '!', 'End')])).toEqual(['a!', 'b', 'c']);
  });

  it('单个字符串视为一行', () => {
    expect(restoreLines('hello', [createMarkRecord(0, '!', 'End')])).toEqual(['hello!']);
  });

  it('不修改输入', () => {
    const chunks = ['hello ', 'world'];
    restoreLines(chunks, [createMarkRecord(0, ', ', 'Middle')]);
    expect(chunks).toEqual(['hello ', 'world']);
  });
});
