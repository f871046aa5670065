/**
 * Tests for MCP tool registry - tool lookup, schema conversion, input validation
 */

import { describe, it, expect, vi } from 'vitest';
import { z, ZodError } from 'zod';

const { mockGetStatistics } = vi.hoisted(() => ({
  mockGetStatistics: vi.fn(),
}));

vi.mock('../../core/history/service.js', () => ({
  getHistoryService: () => ({ getStatistics: mockGetStatistics }),
}));
vi.mock('../../core/drill/service.js', () => ({ getDrillService: vi.fn() }));
vi.mock('../../core/ingestion/service.js', () => ({ getIngestionService: vi.fn() }));

import { tools, getTool, getToolNames, zodToJsonSchema } from './index.js';

describe('MCP Tool Registry', () => {
  it('should register every drill tool in order', () => {
    expect(getToolNames()).toEqual([
      'create_knowledge_base',
      'list_knowledge_bases',
      'delete_knowledge_base',
      'index_document',
      'index_text',
      'generate_question',
      'submit_answer',
      'get_history',
      'get_statistics',
    ]);
  });

  it('should give each tool a description', () => {
    for (const tool of tools) {
      expect(tool.description.length).toBeGreaterThan(10);
    }
  });

  it('should look tools up by name', () => {
    expect(getTool('submit_answer')?.name).toBe('submit_answer');
    expect(getTool('nonexistent_tool')).toBeUndefined();
  });

  describe('handler', () => {
    it('should validate input before running the tool', async () => {
      const tool = getTool('get_statistics');

      await expect(tool?.handler({})).rejects.toBeInstanceOf(ZodError);
      expect(mockGetStatistics).not.toHaveBeenCalled();
    });

    it('should run the tool with parsed input', async () => {
      mockGetStatistics.mockReturnValue({ kbName: 'python', total: 0 });

      const result = await getTool('get_statistics')?.handler({ kb: 'python' });

      expect(mockGetStatistics).toHaveBeenCalledWith('python');
      expect(result).toEqual({ success: true, data: { kbName: 'python', total: 0 } });
    });
  });

  describe('zodToJsonSchema', () => {
    it('should convert primitives with their bounds and descriptions', () => {
      const schema = z.object({
        query: z.string().min(1).max(50).describe('Search query'),
        limit: z.number().int().min(1).max(100).optional().describe('Maximum results'),
        ratio: z.number(),
        enabled: z.boolean(),
      });

      expect(zodToJsonSchema(schema)).toEqual({
        type: 'object',
        properties: {
          query: { type: 'string', minLength: 1, maxLength: 50, description: 'Search query' },
          limit: { type: 'integer', minimum: 1, maximum: 100, description: 'Maximum results' },
          ratio: { type: 'number' },
          enabled: { type: 'boolean' },
        },
        required: ['query', 'ratio', 'enabled'],
      });
    });

    it('should convert enums, arrays and defaults', () => {
      const schema = z.object({
        difficulty: z.enum(['easy', 'medium', 'hard']),
        ids: z.array(z.string()),
        pageSize: z.number().default(20),
      });

      expect(zodToJsonSchema(schema)).toEqual({
        type: 'object',
        properties: {
          difficulty: { type: 'string', enum: ['easy', 'medium', 'hard'] },
          ids: { type: 'array', items: { type: 'string' } },
          pageSize: { type: 'number', default: 20 },
        },
        required: ['difficulty', 'ids'],
      });
    });

    it('should leave out required for an empty object', () => {
      expect(zodToJsonSchema(z.object({}))).toEqual({ type: 'object', properties: {}, required: undefined });
    });

    it('should return a bare object schema for non-object input', () => {
      expect(zodToJsonSchema(z.string())).toEqual({ type: 'object' });
    });

    it('should describe the generate_question input', () => {
      const tool = getTool('generate_question');
      const jsonSchema = tool ? zodToJsonSchema(tool.inputSchema) : {};

      expect(jsonSchema.required).toEqual(['kb']);
      expect(jsonSchema.properties).toMatchObject({
        difficulty: { type: 'string', enum: ['easy', 'medium', 'hard'], description: 'Question difficulty' },
        strategy: { type: 'string', enum: ['random', 'diverse', 'recent', 'comprehensive'] },
      });
    });

    it('should require a name and allow a description when creating a knowledge base', () => {
      const tool = getTool('create_knowledge_base');
      const jsonSchema = tool ? zodToJsonSchema(tool.inputSchema) : {};

      expect(jsonSchema.required).toEqual(['name']);
    });
  });
});
