/**
 * MarkMatcher 单元测试
 */

import { MarkMatcher, collapseMarks } from './mark-matcher';
import { InvalidConfigurationError } from './punctuation-errors';
import { EscapeToken } from './digit-escape';

describe('MarkMatcher', () => {
  describe('标点集合配置', () => {
    it('应该去掉重复字符并保持首次出现顺序', () => {
      expect(new MarkMatcher(';;,,.;').marks).toBe(';,.');
    });

    it('非字符串应该抛出 InvalidConfigurationError', () => {
      const fromJson = JSON.parse('{"marks": null}');
      expect(() => new MarkMatcher(fromJson.marks)).toThrow(InvalidConfigurationError);
      try {
        collapseMarks(42);
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        expect((error as InvalidConfigurationError).received).toBe('number');
        expect((error as InvalidConfigurationError).name).toBe('InvalidConfigurationError');
      }
      expect.assertions(4);
    });

    it('空字符串应该被拒绝', () => {
      expect(() => collapseMarks('')).toThrow('punctuation marks must not be empty');
    });

    it('包含数字保护保留字符时应该被拒绝', () => {
      expect(() => collapseMarks(`,${EscapeToken.Comma}`)).toThrow(InvalidConfigurationError);
    });

    it('正则特殊字符应该按字面匹配', () => {
      const matcher = new MarkMatcher('-]^\\');
      expect(matcher.detect('a-b]c')).toEqual([
        { text: '-', start: 1, end: 2 },
        { text: ']', start: 3, end: 4 },
      ]);
      expect(matcher.remove('a-b]c')).toBe('a b c');
    });
  });

  describe('remove', () => {
    const matcher = new MarkMatcher(',!');

    it('应该把标点替换为空格并去掉首尾空白', () => {
      expect(matcher.remove('hello, my world!')).toBe('hello my world');
    });

    it('两侧空白应该归入同一个标点单元', () => {
      expect(matcher.remove('a , b')).toBe('a b');
    });

    it('列表输入应该返回同样长度的列表', () => {
      const input = ['a, b', '!!!'];
      expect(matcher.remove(input)).toEqual(['a b', '']);
      expect(input).toEqual(['a, b', '!!!']);
    });

    it('重复调用结果不变', () => {
      for (const text of ['hello, my world!', ' ,!, ', 'no marks', 'a,,b!! c']) {
        const once = matcher.remove(text);
        expect(matcher.remove(once)).toBe(once);
      }
    });
  });

  describe('detect', () => {
    it('应该按从左到右返回标点单元及偏移', () => {
      const matcher = new MarkMatcher(',!');
      expect(matcher.detect('hello, my world!')).toEqual([
        { text: ', ', start: 5, end: 7 },
        { text: '!', start: 15, end: 16 },
      ]);
    });

    it('连续标点与空白应该合并为一个最长单元', () => {
      const matcher = new MarkMatcher('.!?');
      expect(matcher.detect('wait ... what?!')).toEqual([
        { text: ' ... ', start: 4, end: 9 },
        { text: '?!', start: 13, end: 15 },
      ]);
    });

    it('没有标点时返回空列表', () => {
      expect(new MarkMatcher(',').detect('no marks here')).toEqual([]);
    });

    it('多次调用互不影响', () => {
      const matcher = new MarkMatcher('!');
      expect(matcher.detect('a!')).toHaveLength(1);
      expect(matcher.detect('a!')).toHaveLength(1);
    });
  });
});
