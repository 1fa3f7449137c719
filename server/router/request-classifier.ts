/**
 * Keyword Request Classifier
 *
 * Decides which capabilities handle a request by lower-cased substring
 * matching, evaluated in a fixed canonical order:
 *
 *   1. repository_management   (floor 0.8)
 *   2. code_generation         (floor 0.8)
 *   3. planning                (floor 0.7)
 *   4. relational_query        (floor 0.9)
 *   5. composite_workflow      (floor 0.8)
 *
 * The first match becomes the primary route; later matches are secondary
 * routes in that same order. No match → general_conversation at 0.5.
 *
 * Pure and total: never throws, never does I/O. Declared operations are
 * audit labels only and do not influence routing.
 */

import type { CapabilityTag, Classification, RequestClassifier } from './types.js';

export const DEFAULT_CONFIDENCE = 0.5;

interface RoutePattern {
  tag: Exclude<CapabilityTag, 'general_conversation'>;
  keywords: string[];
  confidence: number;
  declaredOperations: (lower: string) => string[];
}

const containsAny = (text: string, words: string[]): boolean => words.some((w) => text.includes(w));

const PATTERNS: RoutePattern[] = [
  {
    tag: 'repository_management',
    keywords: ['github', 'repository', 'repo', 'branch', 'git', 'clone', 'fork'],
    confidence: 0.8,
    declaredOperations: (lower) => {
      const ops: string[] = [];
      if (containsAny(lower, ['create', 'new'])) ops.push('create_repository');
      if (lower.includes('branch')) ops.push('manage_branches');
      if (containsAny(lower, ['list', 'show', 'get'])) ops.push('list_repositories');
      return ops;
    },
  },
  {
    tag: 'code_generation',
    keywords: ['code', 'generate', 'program', 'function', 'class', 'script', 'algorithm'],
    confidence: 0.8,
    declaredOperations: (lower) => {
      if (lower.includes('explain')) return ['explain_code'];
      if (containsAny(lower, ['optimize', 'optimise'])) return ['optimize_code'];
      return ['generate_code'];
    },
  },
  {
    tag: 'planning',
    keywords: ['plan', 'strategy', 'steps', 'how to', 'break down', 'organize'],
    confidence: 0.7,
    declaredOperations: (lower) =>
      containsAny(lower, ['break down', 'breakdown', 'steps']) ? ['break_down_task'] : ['create_plan'],
  },
  {
    tag: 'relational_query',
    keywords: ['mysql', 'postgres', 'database', 'sql', 'query', 'table', 'select', 'insert', 'update', 'delete'],
    confidence: 0.9,
    declaredOperations: (lower) => {
      const ops: string[] = [];
      if (lower.includes('setup') && lower.includes('table')) ops.push('setup_tables');
      if (lower.includes('connect')) ops.push('test_connection');
      ops.push('query_database');
      return ops;
    },
  },
  {
    tag: 'composite_workflow',
    keywords: ['workflow', 'intelligent', 'automate', 'integrate', 'combine services'],
    confidence: 0.8,
    declaredOperations: () => ['create_workflow'],
  },
];

export function classifyRequest(text: string): Classification {
  const lower = text.toLowerCase();

  let primaryRoute: CapabilityTag = 'general_conversation';
  const secondaryRoutes: CapabilityTag[] = [];
  let confidence = DEFAULT_CONFIDENCE;
  const declared: string[] = [];

  for (const pattern of PATTERNS) {
    if (!containsAny(lower, pattern.keywords)) continue;

    if (primaryRoute === 'general_conversation') {
      primaryRoute = pattern.tag;
    } else {
      secondaryRoutes.push(pattern.tag);
    }
    confidence = Math.max(confidence, pattern.confidence);

    for (const op of pattern.declaredOperations(lower)) {
      if (!declared.includes(op)) declared.push(op);
    }
  }

  return { primaryRoute, secondaryRoutes, confidence, declaredOperations: declared };
}

export class KeywordRequestClassifier implements RequestClassifier {
  classify(text: string): Classification {
    return classifyRequest(text);
  }
}
