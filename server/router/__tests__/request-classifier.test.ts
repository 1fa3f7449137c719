import { describe, it, expect } from 'vitest';
import { classifyRequest, KeywordRequestClassifier, DEFAULT_CONFIDENCE } from '../request-classifier.js';
import { CAPABILITY_TAGS } from '../types.js';

describe('classifyRequest', () => {
  describe('defaults', () => {
    it('routes input without keywords to general_conversation at 0.5', () => {
      expect(classifyRequest('hello there')).toEqual({
        primaryRoute: 'general_conversation',
        secondaryRoutes: [],
        confidence: 0.5,
        declaredOperations: [],
      });
    });

    it('handles empty input', () => {
      const result = classifyRequest('');
      expect(result.primaryRoute).toBe('general_conversation');
      expect(result.confidence).toBe(DEFAULT_CONFIDENCE);
    });

    it('always returns a known tag', () => {
      const inputs = ['', '   ', '🙂🙂', '\n\t', 'x'.repeat(5000), 'ß ü é', '```\ncode\n```'];
      for (const input of inputs) {
        expect(CAPABILITY_TAGS).toContain(classifyRequest(input).primaryRoute);
      }
    });
  });

  describe('single match', () => {
    it('classifies a repository request', () => {
      expect(classifyRequest('create repository demo-app')).toEqual({
        primaryRoute: 'repository_management',
        secondaryRoutes: [],
        confidence: 0.8,
        declaredOperations: ['create_repository'],
      });
    });

    it('uses the planning floor for a planning-only request', () => {
      expect(classifyRequest('what is your strategy for the launch')).toEqual({
        primaryRoute: 'planning',
        secondaryRoutes: [],
        confidence: 0.7,
        declaredOperations: ['create_plan'],
      });
    });

    it('classifies a database question', () => {
      expect(classifyRequest('show me all users from the database')).toEqual({
        primaryRoute: 'relational_query',
        secondaryRoutes: [],
        confidence: 0.9,
        declaredOperations: ['query_database'],
      });
    });

    it('is case-insensitive', () => {
      expect(classifyRequest('CREATE REPOSITORY Demo').primaryRoute).toBe('repository_management');
    });
  });

  describe('multiple matches', () => {
    it('keeps canonical order: code generation before planning', () => {
      const result = classifyRequest('generate a python function to sort a list and also plan how to test it');
      expect(result.primaryRoute).toBe('code_generation');
      expect(result.secondaryRoutes).toEqual(['planning']);
      expect(result.confidence).toBe(0.8);
      expect(result.declaredOperations).toEqual(['generate_code', 'create_plan']);
    });

    it('raises confidence monotonically across matches', () => {
      const result = classifyRequest('automate a plan');
      expect(result.primaryRoute).toBe('planning');
      expect(result.secondaryRoutes).toEqual(['composite_workflow']);
      expect(result.confidence).toBe(0.8);
      expect(result.declaredOperations).toEqual(['create_plan', 'create_workflow']);
    });

    it('orders every secondary route canonically', () => {
      const result = classifyRequest('workflow sql plan code github');
      expect(result.primaryRoute).toBe('repository_management');
      expect(result.secondaryRoutes).toEqual(['code_generation', 'planning', 'relational_query', 'composite_workflow']);
      expect(result.confidence).toBe(0.9);
    });

    it('collects declared operations in evaluation order', () => {
      const result = classifyRequest('list branches in my github repo and query the database table');
      expect(result.primaryRoute).toBe('repository_management');
      expect(result.secondaryRoutes).toEqual(['relational_query']);
      expect(result.declaredOperations).toEqual(['manage_branches', 'list_repositories', 'query_database']);
    });

    it('matches keywords as substrings ("explain" contains "plan")', () => {
      const result = classifyRequest('explain this class');
      expect(result.primaryRoute).toBe('code_generation');
      expect(result.secondaryRoutes).toEqual(['planning']);
      expect(result.declaredOperations).toEqual(['explain_code', 'create_plan']);
    });
  });

  describe('declared operations', () => {
    it('declares setup and connection checks for the database', () => {
      expect(classifyRequest('setup tables and connect to postgres').declaredOperations).toEqual([
        'setup_tables',
        'test_connection',
        'query_database',
      ]);
    });

    it('declares a breakdown for step requests', () => {
      const result = classifyRequest('break down the migration into steps');
      expect(result.primaryRoute).toBe('planning');
      expect(result.declaredOperations).toEqual(['break_down_task']);
    });

    it('declares optimization with either spelling', () => {
      expect(classifyRequest('optimise this function').declaredOperations).toEqual(['optimize_code']);
      expect(classifyRequest('optimize this function').declaredOperations).toEqual(['optimize_code']);
    });
  });

  it('is deterministic', () => {
    const text = 'create a new repo and generate code for it';
    expect(classifyRequest(text)).toEqual(classifyRequest(text));
  });
});

describe('KeywordRequestClassifier', () => {
  it('delegates to classifyRequest', () => {
    const classifier = new KeywordRequestClassifier();
    expect(classifier.classify('hello there')).toEqual(classifyRequest('hello there'));
  });
});
