/**
 * MCP Tool Registry
 */

import { z } from 'zod';
import {
  createKnowledgeBase,
  createKnowledgeBaseSchema,
  deleteKnowledgeBase,
  deleteKnowledgeBaseSchema,
  listKnowledgeBases,
  listKnowledgeBasesSchema,
} from './knowledge-bases.js';
import { indexDocument, indexDocumentSchema, indexText, indexTextSchema } from './documents.js';
import { generateQuestion, generateQuestionSchema, submitAnswer, submitAnswerSchema } from './drill.js';
import { getHistory, getHistorySchema, getStatistics, getStatisticsSchema } from './history.js';
import type { ToolResult } from '../../types/index.js';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  /** Validates `params` against `inputSchema`; throws ZodError when they do not match */
  handler: (params: unknown) => Promise<ToolResult>;
}

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  inputSchema: S;
  run: (params: z.infer<S>) => Promise<ToolResult>;
}): ToolDefinition {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    handler: async (params) => definition.run(definition.inputSchema.parse(params)),
  };
}

export const tools: ToolDefinition[] = [
  defineTool({
    name: 'create_knowledge_base',
    description: 'Create an empty knowledge base that documents can be indexed into.',
    inputSchema: createKnowledgeBaseSchema,
    run: createKnowledgeBase,
  }),
  defineTool({
    name: 'list_knowledge_bases',
    description: 'List all knowledge bases with their indexed document counts.',
    inputSchema: listKnowledgeBasesSchema,
    run: listKnowledgeBases,
  }),
  defineTool({
    name: 'delete_knowledge_base',
    description: 'Delete a knowledge base together with its documents, vectors and answer history.',
    inputSchema: deleteKnowledgeBaseSchema,
    run: deleteKnowledgeBase,
  }),
  defineTool({
    name: 'index_document',
    description: 'Index a .txt or .md file into a knowledge base. Unchanged files are skipped unless force is set.',
    inputSchema: indexDocumentSchema,
    run: indexDocument,
  }),
  defineTool({
    name: 'index_text',
    description: 'Index raw text into a knowledge base without needing a file.',
    inputSchema: indexTextSchema,
    run: indexText,
  }),
  defineTool({
    name: 'generate_question',
    description: 'Generate an open-ended quiz question from the content of a knowledge base. Returns the question and its id.',
    inputSchema: generateQuestionSchema,
    run: generateQuestion,
  }),
  defineTool({
    name: 'submit_answer',
    description: 'Grade a free-text answer to a generated question and record it in the history.',
    inputSchema: submitAnswerSchema,
    run: submitAnswer,
  }),
  defineTool({
    name: 'get_history',
    description: 'Page through past questions and answers of a knowledge base, newest first.',
    inputSchema: getHistorySchema,
    run: getHistory,
  }),
  defineTool({
    name: 'get_statistics',
    description: 'Summarize answer accuracy, average score and score distribution for a knowledge base.',
    inputSchema: getStatisticsSchema,
    run: getStatistics,
  }),
];

export function getTool(name: string): ToolDefinition | undefined {
  return tools.find(t => t.name === name);
}

export function getToolNames(): string[] {
  return tools.map(t => t.name);
}

/**
 * Convert a Zod object schema to the JSON Schema MCP clients expect
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodTypeToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  }

  return { type: 'object' };
}

function withDescription(result: Record<string, unknown>, description: string | undefined): Record<string, unknown> {
  if (description && result.description === undefined) {
    result.description = description;
  }
  return result;
}

function zodTypeToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodOptional) {
    return withDescription(zodTypeToJsonSchema(schema.unwrap()), schema.description);
  }

  if (schema instanceof z.ZodDefault) {
    return withDescription(
      { ...zodTypeToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() },
      schema.description
    );
  }

  if (schema instanceof z.ZodNullable) {
    return withDescription({ ...zodTypeToJsonSchema(schema.unwrap()), nullable: true }, schema.description);
  }

  if (schema instanceof z.ZodEffects) {
    return withDescription(zodTypeToJsonSchema(schema.innerType()), schema.description);
  }

  if (schema instanceof z.ZodString) {
    const result: Record<string, unknown> = { type: 'string' };
    if (schema.minLength !== null) result.minLength = schema.minLength;
    if (schema.maxLength !== null) result.maxLength = schema.maxLength;
    return withDescription(result, schema.description);
  }

  if (schema instanceof z.ZodNumber) {
    const result: Record<string, unknown> = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) result.minimum = schema.minValue;
    if (schema.maxValue !== null) result.maximum = schema.maxValue;
    return withDescription(result, schema.description);
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' }, schema.description);
  }

  if (schema instanceof z.ZodEnum) {
    return withDescription({ type: 'string', enum: [...schema.options] }, schema.description);
  }

  if (schema instanceof z.ZodArray) {
    return withDescription({ type: 'array', items: zodTypeToJsonSchema(schema.element) }, schema.description);
  }

  if (schema instanceof z.ZodObject) {
    return withDescription(zodToJsonSchema(schema), schema.description);
  }

  if (schema instanceof z.ZodRecord) {
    return withDescription(
      { type: 'object', additionalProperties: zodTypeToJsonSchema(schema.valueSchema) },
      schema.description
    );
  }

  if (schema instanceof z.ZodUnknown || schema instanceof z.ZodAny) {
    return {};
  }

  return withDescription({ type: 'string' }, schema.description);
}
