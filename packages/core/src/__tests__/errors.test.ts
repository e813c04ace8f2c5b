import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  ConfigurationError,
  ExternalServiceError,
  SqlParseError,
  toError,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE');

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.name).toBe('AppError');
    expect(error).toBeInstanceOf(Error);
  });
});

describe('ValidationError', () => {
  it('should carry details', () => {
    const error = new ValidationError('Invalid table name', { kind: 'table' });

    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details).toEqual({ kind: 'table' });
    expect(error).toBeInstanceOf(AppError);
  });
});

describe('ConfigurationError', () => {
  it('should list the invalid fields', () => {
    const error = new ConfigurationError('Invalid config', ['requestsPerMin: too small']);

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.issues).toEqual(['requestsPerMin: too small']);
  });

  it('should default to no issues', () => {
    expect(new ConfigurationError('Invalid config').issues).toEqual([]);
  });
});

describe('ExternalServiceError', () => {
  it('should prefix the message with the service name', () => {
    const cause = new Error('quota exceeded');
    const error = new ExternalServiceError('AuditLogs', 'quota exceeded', cause);

    expect(error.message).toBe('AuditLogs error: quota exceeded');
    expect(error.service).toBe('AuditLogs');
    expect(error.originalError).toBe(cause);
  });
});

describe('SqlParseError', () => {
  it('should use the SQL_PARSE_ERROR code', () => {
    const error = new SqlParseError('Unable to parse SQL');

    expect(error.code).toBe('SQL_PARSE_ERROR');
    expect(error.originalError).toBeUndefined();
  });
});

describe('toError', () => {
  it('should return errors unchanged', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
  });

  it('should wrap other values', () => {
    expect(toError('boom').message).toBe('boom');
    expect(toError(42).message).toBe('42');
  });
});
