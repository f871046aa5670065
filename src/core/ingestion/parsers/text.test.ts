/**
 * Tests for Text and Markdown Parser
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockReadFile = vi.fn();
vi.mock('fs/promises', () => ({
  readFile: (...args: unknown[]) => mockReadFile(...args),
}));

import { parseTextFile, parseMarkdownFile } from './text.js';

describe('Text Parser', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('parseTextFile', () => {
    it('should read the file as UTF-8', async () => {
      mockReadFile.mockResolvedValue('Python 是一门编程语言。');

      const result = await parseTextFile('/docs/python.txt');

      expect(mockReadFile).toHaveBeenCalledWith('/docs/python.txt', 'utf-8');
      expect(result).toEqual({
        content: 'Python 是一门编程语言。',
        metadata: { source: '/docs/python.txt' },
      });
    });

    it('should trim surrounding whitespace', async () => {
      mockReadFile.mockResolvedValue('  \n  内容  \n  ');

      const result = await parseTextFile('/docs/a.txt');

      expect(result.content).toBe('内容');
    });

    it('should drop a byte order mark', async () => {
      mockReadFile.mockResolvedValue('\uFEFF第一行\n第二行');

      const result = await parseTextFile('/docs/bom.txt');

      expect(result.content).toBe('第一行\n第二行');
    });

    it('should return empty content for an empty file', async () => {
      mockReadFile.mockResolvedValue('');

      const result = await parseTextFile('/docs/empty.txt');

      expect(result.content).toBe('');
    });

    it('should propagate read errors', async () => {
      mockReadFile.mockRejectedValue(new Error('File not found'));

      await expect(parseTextFile('/docs/missing.txt')).rejects.toThrow('File not found');
    });
  });

  describe('parseMarkdownFile', () => {
    it('should keep headings in the content', async () => {
      const markdown = '# 概述\n\nPython 简介。\n\n## 安装\n\n使用 pip 安装。';
      mockReadFile.mockResolvedValue(markdown);

      const result = await parseMarkdownFile('/docs/python.md');

      expect(result.content).toBe(markdown);
      expect(result.metadata).toEqual({ title: '概述', source: '/docs/python.md' });
    });

    it('should leave the title undefined without an H1', async () => {
      mockReadFile.mockResolvedValue('## Section\n\nContent without main title');

      const result = await parseMarkdownFile('/docs/a.md');

      expect(result.metadata.title).toBeUndefined();
    });

    it('should take the first H1 even after other headings', async () => {
      mockReadFile.mockResolvedValue('## 前言\n\n# 正文标题\n\n内容');

      const result = await parseMarkdownFile('/docs/a.md');

      expect(result.metadata.title).toBe('正文标题');
    });

    it('should handle Windows line endings', async () => {
      mockReadFile.mockResolvedValue('# Title\r\n\r\nContent\r\n');

      const result = await parseMarkdownFile('/docs/a.md');

      expect(result.metadata.title).toBe('Title');
      expect(result.content).toBe('# Title\r\n\r\nContent');
    });
  });
});
