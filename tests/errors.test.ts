/**
 * Tests for the workflow error hierarchy.
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  WorkflowError,
  ConfigurationError,
  DataUnavailableError,
  GenerationFailure,
  EvaluationFailure,
  ArtifactConflictError,
  ArtifactWriteError,
  CancellationError,
  ModelTimeoutError,
  wrapError,
  toError,
  isWorkflowError,
  formatError,
} from '../src/errors/index.js';
import { ProviderError } from '../src/providers/types.js';

describe('Error Types', () => {
  describe('WorkflowError', () => {
    it('should create error with all properties', () => {
      const cause = new Error('root cause');
      const error = new WorkflowError('Something went wrong', ErrorCategory.TRANSIENT, true, { key: 'value' }, cause);

      expect(error.message).toBe('Something went wrong');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.cause).toBe(cause);
      expect(error.timestamp).toBeInstanceOf(Date);
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize to JSON', () => {
      const error = new WorkflowError('Test error', ErrorCategory.PERMANENT, false, { foo: 'bar' }, new Error('inner'));

      const json = error.toJSON();
      expect(json.name).toBe('WorkflowError');
      expect(json.message).toBe('Test error');
      expect(json.category).toBe(ErrorCategory.PERMANENT);
      expect(json.recoverable).toBe(false);
      expect(json.context).toEqual({ foo: 'bar' });
      expect(json.cause).toBe('inner');
    });

    it('should format for logging', () => {
      const error = new WorkflowError('Test error', ErrorCategory.TRANSIENT, true, { key: 'value' });

      expect(error.toLogString()).toBe('[WorkflowError] (TRANSIENT) Test error context={"key":"value"}');
    });

    it('should omit empty context from the log string', () => {
      const error = new WorkflowError('Bare', ErrorCategory.INTERNAL, false);

      expect(error.toLogString()).toBe('[WorkflowError] (INTERNAL) Bare');
    });
  });

  describe('ConfigurationError', () => {
    it('should name the missing credential and model', () => {
      const error = ConfigurationError.missingCredential('OPENAI_API_KEY', 'gpt-4o');

      expect(error.message).toBe(
        'Missing API key: set OPENAI_API_KEY in the environment or .env file to use model "gpt-4o"'
      );
      expect(error.settings).toEqual(['OPENAI_API_KEY']);
      expect(error.category).toBe(ErrorCategory.VALIDATION);
      expect(error.recoverable).toBe(false);
      expect(error.context.model).toBe('gpt-4o');
    });

    it('should build from zod issues', () => {
      const error = ConfigurationError.fromZodError('case file cases.json', {
        issues: [
          { path: ['cases', 0, 'dataset'], message: 'Required' },
          { path: [], message: 'Expected object' },
        ],
      });

      expect(error.message).toBe('Invalid case file cases.json: cases.0.dataset: Required, (root): Expected object');
      expect(error.settings).toEqual(['cases.0.dataset', '']);
    });
  });

  describe('per-request failures', () => {
    it('should classify DataUnavailableError as a dependency failure', () => {
      const error = new DataUnavailableError('Dataset not found: x.csv', { dataset: 'x.csv' });

      expect(error.name).toBe('DataUnavailableError');
      expect(error.category).toBe(ErrorCategory.DEPENDENCY);
      expect(error.context).toEqual({ dataset: 'x.csv' });
    });

    it('should make GenerationFailure transient when it timed out', () => {
      const plain = new GenerationFailure('bad payload', { caseLabel: 'chart' });
      const timedOut = new GenerationFailure('slow', { caseLabel: 'chart' }, undefined, true);

      expect(plain.category).toBe(ErrorCategory.DEPENDENCY);
      expect(plain.recoverable).toBe(false);
      expect(plain.context).toEqual({ caseLabel: 'chart' });
      expect(timedOut.category).toBe(ErrorCategory.TRANSIENT);
      expect(timedOut.recoverable).toBe(true);
      expect(timedOut.context).toEqual({ caseLabel: 'chart', timedOut: true });
    });

    it('should keep the cause on EvaluationFailure', () => {
      const cause = new Error('HTTP 500');
      const error = new EvaluationFailure('Reflection failed', {}, cause);

      expect(error.name).toBe('EvaluationFailure');
      expect(error.cause).toBe(cause);
      expect(error.toJSON().cause).toBe('HTTP 500');
    });

    it('should name the path and the way out in ArtifactConflictError', () => {
      const error = new ArtifactConflictError('/out/sales_chart_v1.svg', { dataset: 'sales.csv' });

      expect(error.message).toBe(
        'Refusing to overwrite existing artifact: /out/sales_chart_v1.svg (pass --overwrite to replace it)'
      );
      expect(error.path).toBe('/out/sales_chart_v1.svg');
      expect(error.category).toBe(ErrorCategory.PERMANENT);
      expect(error.context).toEqual({ dataset: 'sales.csv', path: '/out/sales_chart_v1.svg' });
    });

    it('should include the file system reason in ArtifactWriteError', () => {
      const error = new ArtifactWriteError('/out/a_v1.svg', {}, new Error('EACCES: permission denied'));

      expect(error.message).toBe('Could not write artifact /out/a_v1.svg: EACCES: permission denied');
      expect(error.category).toBe(ErrorCategory.DEPENDENCY);
    });

    it('should keep the reason on CancellationError', () => {
      const error = new CancellationError('Run cancelled', { caseLabel: 'x' });

      expect(error.reason).toBe('Run cancelled');
      expect(error.category).toBe(ErrorCategory.CANCELLED);
      expect(error.context).toEqual({ caseLabel: 'x', reason: 'Run cancelled' });
      expect(new CancellationError().message).toBe('Operation cancelled');
    });

    it('should report model and budget in ModelTimeoutError', () => {
      const error = new ModelTimeoutError('gpt-4o', 1500);

      expect(error.message).toBe('Model "gpt-4o" did not answer within 1500ms');
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ model: 'gpt-4o', timeoutMs: 1500 });
    });
  });

  describe('ProviderError', () => {
    it('should map codes to categories', () => {
      expect(new ProviderError('x', 'openai', 'RATE_LIMITED').category).toBe(ErrorCategory.RATE_LIMITED);
      expect(new ProviderError('x', 'openai', 'RATE_LIMITED').recoverable).toBe(true);
      expect(new ProviderError('x', 'openai', 'AUTHENTICATION_FAILED').recoverable).toBe(false);
      expect(new ProviderError('x', 'openai', 'CANCELLED').category).toBe(ErrorCategory.CANCELLED);
      expect(new ProviderError('x', 'anthropic', 'SERVER_ERROR').context).toEqual({
        provider: 'anthropic',
        code: 'SERVER_ERROR',
      });
    });
  });

  describe('utilities', () => {
    it('should pass workflow errors through wrapError', () => {
      const error = new GenerationFailure('x');
      expect(wrapError(error, { extra: 1 })).toBe(error);
    });

    it('should wrap plain errors as internal in wrapError', () => {
      const wrapped = wrapError(new Error('boom'), { dataset: 'a.csv' });

      expect(wrapped).toBeInstanceOf(WorkflowError);
      expect(wrapped.category).toBe(ErrorCategory.INTERNAL);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.context).toEqual({ dataset: 'a.csv' });
      expect(wrapped.cause?.message).toBe('boom');
    });

    it('should normalise thrown values with toError', () => {
      expect(toError('text').message).toBe('text');
      const err = new Error('same');
      expect(toError(err)).toBe(err);
    });

    it('should narrow with isWorkflowError', () => {
      expect(isWorkflowError(new CancellationError())).toBe(true);
      expect(isWorkflowError(new Error('plain'))).toBe(false);
    });

    it('should prefix workflow errors with their name in formatError', () => {
      expect(formatError(new DataUnavailableError('Dataset not found: a.csv'))).toBe(
        'DataUnavailableError: Dataset not found: a.csv'
      );
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError(42)).toBe('42');
    });
  });
});
