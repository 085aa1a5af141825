import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  EmptyExtractionError,
  ExtractionError,
  PersistenceError,
  PipelineError,
  getExitCode,
  wrapError,
} from './errors.js';

describe('PipelineError', () => {
  it('should carry a code and the standard hint', () => {
    const error = new EmptyExtractionError('/docs/client/scan.pdf');

    expect(error).toBeInstanceOf(PipelineError);
    expect(error.code).toBe('EMPTY_EXTRACTION');
    expect(error.message).toBe('No text extracted from /docs/client/scan.pdf');
    expect(error.hint).toContain('no text layer');
  });

  it('should fold the cause into an extraction failure message', () => {
    const error = new ExtractionError('/docs/a.pdf', { cause: new Error('bad xref table') });

    expect(error.message).toBe('Failed to extract text from /docs/a.pdf: bad xref table');
    expect(error.cause).toBeInstanceOf(Error);
  });
});

describe('wrapError', () => {
  it('should pass pipeline errors through unchanged', () => {
    const original = new ConfigurationError('missing key');

    expect(wrapError(original)).toBe(original);
  });

  it('should wrap anything else as UNEXPECTED', () => {
    const wrapped = wrapError(new TypeError('boom'));

    expect(wrapped.code).toBe('UNEXPECTED');
    expect(wrapped.message).toBe('boom');
    expect(wrapError('plain string').message).toBe('plain string');
  });
});

describe('getExitCode', () => {
  it('should exit with 1 for startup failures', () => {
    expect(getExitCode(new ConfigurationError('x'))).toBe(1);
    expect(getExitCode(new PersistenceError('x'))).toBe(1);
    expect(getExitCode(new Error('x'))).toBe(1);
  });

  it('should exit with 2 for other pipeline errors escaping a run', () => {
    expect(getExitCode(new EmptyExtractionError('x'))).toBe(2);
    expect(getExitCode(wrapError(new Error('EACCES: permission denied, scandir')))).toBe(2);
  });
});
