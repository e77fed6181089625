import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  MirrorError,
  HarvestError,
  CheckpointError,
  AnalysisServiceError,
  NotificationError,
  TimeoutError,
  ProcessError,
  PipelineStateError,
  PromptError,
  exitCodeFor,
  toError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('HarvestError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('MirrorError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('typed errors', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError', 'ConfigError'],
    [new UsageError('x'), 'UsageError', 'UsageError'],
    [new MirrorError('x'), 'MirrorError', 'MirrorError'],
    [new HarvestError('x'), 'HarvestError', 'HarvestError'],
    [new CheckpointError('x'), 'CheckpointError', 'CheckpointError'],
    [new NotificationError('x'), 'NotificationError', 'NotificationError'],
    [new TimeoutError('x'), 'TimeoutError', 'TimeoutError'],
    [new PipelineStateError('x'), 'PipelineError', 'PipelineStateError'],
    [new PromptError('x'), 'PromptError', 'PromptError'],
  ])('%s carries its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('AnalysisServiceError carries status and body', () => {
    const error = new AnalysisServiceError('API error: 500', {
      status: 500,
      body: '{"error":"boom"}',
    });
    expect(error.code).toBe('ProviderError');
    expect(error.status).toBe(500);
    expect(error.body).toBe('{"error":"boom"}');
    expect(error.details).toEqual({ status: 500, body: '{"error":"boom"}' });
  });

  it('ProcessError carries the exit code', () => {
    const error = new ProcessError('git failed', { exitCode: 128 });
    expect(error.exitCode).toBe(128);
    expect(error.code).toBe('ProcessError');
  });
});

describe('exitCodeFor', () => {
  it('returns 2 for user-correctable errors', () => {
    expect(exitCodeFor(new ConfigError('missing LLM_API_KEY'))).toBe(2);
    expect(exitCodeFor(new UsageError('bad flag'))).toBe(2);
  });

  it('returns 1 for runtime failures', () => {
    expect(exitCodeFor(new MirrorError('clone failed'))).toBe(1);
    expect(exitCodeFor(new HarvestError('log failed'))).toBe(1);
    expect(exitCodeFor(new CheckpointError('disk full'))).toBe(1);
    expect(exitCodeFor(new AnalysisServiceError('500', { status: 500 }))).toBe(1);
    expect(exitCodeFor(new NotificationError('smtp down'))).toBe(1);
    expect(exitCodeFor(new PromptError('no delimiter'))).toBe(1);
    expect(exitCodeFor(new Error('plain'))).toBe(1);
    expect(exitCodeFor('string')).toBe(1);
  });
});

describe('toError', () => {
  it('keeps Error instances and wraps everything else', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('oops').message).toBe('oops');
  });
});
