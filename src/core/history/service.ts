/**
 * Q/A history: persists drill attempts and answers history queries
 */

import { v4 as uuidv4 } from 'uuid';
import {
  countQARecords,
  deleteQARecordsByKnowledgeBase,
  getKnowledgeBaseByName,
  getQARecordById,
  getQARecords,
  getQAScores,
  insertQARecord,
} from '../../storage/sqlite.js';
import { KnowledgeBaseNotFoundError } from '../errors.js';
import type {
  AttemptRecord,
  HistoryRecorder,
  HistoryStatistics,
  KnowledgeBase,
  QARecord,
} from '../../types/index.js';

export interface HistoryPageOptions {
  page?: number;
  pageSize?: number;
  onlyIncorrect?: boolean;
}

export interface HistoryPage {
  records: QARecord[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

const MAX_PAGE_SIZE = 100;

/** Lower bound of each bucket, highest first */
const SCORE_BUCKETS: Array<[string, number]> = [
  ['9-10', 9],
  ['8-8.9', 8],
  ['7-7.9', 7],
  ['6-6.9', 6],
  ['5-5.9', 5],
  ['0-4.9', 0],
];

export function scoreBucket(score: number): string {
  for (const [label, lower] of SCORE_BUCKETS) {
    if (score >= lower) return label;
  }
  return '0-4.9';
}

export class HistoryService implements HistoryRecorder {
  private requireKnowledgeBase(kbName: string): KnowledgeBase {
    const kb = getKnowledgeBaseByName(kbName);
    if (!kb) {
      throw new KnowledgeBaseNotFoundError(kbName);
    }
    return kb;
  }

  /**
   * Store one attempt; a degraded or invalid evaluation is stored as
   * unevaluated. Returns the record id.
   */
  async record(attempt: AttemptRecord): Promise<string> {
    const { question, evaluation } = attempt;
    const kb = this.requireKnowledgeBase(question.kbName);

    const record: QARecord = {
      id: uuidv4(),
      kbName: kb.name,
      questionId: question.id,
      question: question.content,
      sourceFragmentId: question.sourceFragmentId,
      difficulty: question.difficulty,
      strategy: question.strategy,
      sourceContext: question.sourceContext,
      userAnswer: attempt.userAnswer,
      evaluation,
      evaluated: evaluation.status === 'evaluated',
      createdAt: attempt.timestamp,
    };

    insertQARecord(kb.id, record);
    return record.id;
  }

  getHistoryPage(kbName: string, options: HistoryPageOptions = {}): HistoryPage {
    const kb = this.requireKnowledgeBase(kbName);
    const page = Math.max(1, Math.floor(options.page ?? 1));
    const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(options.pageSize ?? 20)));

    const total = countQARecords(kb.id, options.onlyIncorrect);
    const records = getQARecords(kb.id, {
      limit: pageSize,
      offset: (page - 1) * pageSize,
      onlyIncorrect: options.onlyIncorrect,
    });

    return {
      records,
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    };
  }

  getRecord(id: string): QARecord | null {
    return getQARecordById(id);
  }

  getStatistics(kbName: string): HistoryStatistics {
    const kb = this.requireKnowledgeBase(kbName);
    const rows = getQAScores(kb.id);
    const evaluated = rows.filter(row => row.evaluated);
    const correct = evaluated.filter(row => row.isCorrect).length;

    const scoreDistribution: Record<string, number> = {};
    for (const [label] of SCORE_BUCKETS) {
      scoreDistribution[label] = 0;
    }
    let scoreSum = 0;
    for (const row of evaluated) {
      scoreDistribution[scoreBucket(row.score)] += 1;
      scoreSum += row.score;
    }

    return {
      kbName: kb.name,
      total: rows.length,
      evaluated: evaluated.length,
      correct,
      accuracy: evaluated.length > 0 ? Math.round((correct / evaluated.length) * 1000) / 10 : 0,
      averageScore: evaluated.length > 0 ? Math.round((scoreSum / evaluated.length) * 100) / 100 : 0,
      scoreDistribution,
    };
  }

  /**
   * Returns the number of records removed
   */
  deleteHistory(kbName: string): number {
    const kb = this.requireKnowledgeBase(kbName);
    const removed = deleteQARecordsByKnowledgeBase(kb.id);
    console.error(`[history] removed ${removed} records from "${kb.name}"`);
    return removed;
  }
}

// Singleton instance
let historyService: HistoryService | null = null;

export function getHistoryService(): HistoryService {
  if (!historyService) {
    historyService = new HistoryService();
  }
  return historyService;
}
