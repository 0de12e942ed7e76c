import { describe, it, expect } from 'vitest';
import {
  AlmanacError,
  BudgetExceededError,
  NotFoundError,
  ProviderError,
  SchemaError,
  TransientError,
  errorMessage,
  isAlmanacError,
} from '../errors.js';

describe('error taxonomy', () => {
  it('tags each subclass with its code', () => {
    expect(new TransientError('t').code).toBe('TRANSIENT');
    expect(new NotFoundError('n').code).toBe('NOT_FOUND');
    expect(new SchemaError('s').code).toBe('SCHEMA');
    expect(new ProviderError('p').code).toBe('PROVIDER');
    expect(new BudgetExceededError(2).code).toBe('BUDGET_EXCEEDED');
  });

  it('keeps the HTTP status and cause on transient errors', () => {
    const cause = new Error('socket hang up');
    const err = new TransientError('Weather API returned HTTP 503', { status: 503, cause });
    expect(err.status).toBe(503);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe('TransientError');
    expect(err).toBeInstanceOf(AlmanacError);
  });

  it('names the tools still requested when the round budget runs out', () => {
    const err = new BudgetExceededError(3, ['search_wikipedia', 'calculate']);
    expect(err.message).toBe('Agent did not produce an answer within 3 rounds (model still requesting: search_wikipedia, calculate)');
    expect(err.maxRounds).toBe(3);
    expect(new BudgetExceededError(1).message).toBe('Agent did not produce an answer within 1 rounds');
  });

  it('records the provider id', () => {
    expect(new ProviderError('boom', 'openai').providerId).toBe('openai');
  });
});

describe('helpers', () => {
  it('recognizes taxonomy errors only', () => {
    expect(isAlmanacError(new SchemaError('x'))).toBe(true);
    expect(isAlmanacError(new Error('x'))).toBe(false);
    expect(isAlmanacError('x')).toBe(false);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
