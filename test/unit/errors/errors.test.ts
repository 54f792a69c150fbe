import {
  ComposeParseError,
  ConfigurationError,
  isApplicationError,
  isNotFoundError,
  isValidationError,
  normalizeError,
  NotFoundError,
  ValidationError,
} from '../../../src/errors/index.js';

describe('application errors', () => {
  it('carry a code, context and timestamp', () => {
    const error = new ComposeParseError('Invalid YAML: bad indentation', 'compose.yaml');

    expect(error.name).toBe('ComposeParseError');
    expect(error.code).toBe('COMPOSE_PARSE_ERROR');
    expect(error.context).toEqual({ filePath: 'compose.yaml' });
    expect(error.timestamp).toBeInstanceOf(Date);
    expect(error).toBeInstanceOf(Error);
  });

  it('serialize to JSON', () => {
    const error = new NotFoundError('Compose file not found', 'file', 'compose.yaml');
    expect(error.toJSON()).toMatchObject({
      name: 'NotFoundError',
      message: 'Compose file not found',
      code: 'NOT_FOUND',
      context: { resourceType: 'file', resourceId: 'compose.yaml' },
    });
  });

  it('are recognized by the type guards', () => {
    expect(isApplicationError(new ConfigurationError('bad', 'server.logLevel'))).toBe(true);
    expect(isApplicationError(new Error('plain'))).toBe(false);
    expect(isValidationError(new ValidationError('bad'))).toBe(true);
    expect(isNotFoundError(new ValidationError('bad'))).toBe(false);
  });
});

describe('normalizeError', () => {
  it('returns application errors unchanged', () => {
    const error = new ValidationError('bad input');
    expect(normalizeError(error)).toBe(error);
  });

  it('maps missing files to NotFoundError', () => {
    const normalized = normalizeError(new Error("ENOENT: no such file or directory, open 'compose.yaml'"));
    expect(normalized).toBeInstanceOf(NotFoundError);
    expect(normalized.context).toEqual({ resourceType: 'file', resourceId: undefined });
  });

  it('maps YAML exceptions to ComposeParseError', () => {
    const yamlError = new Error('bad indentation of a mapping entry');
    yamlError.name = 'YAMLException';

    const normalized = normalizeError(yamlError);
    expect(normalized).toBeInstanceOf(ComposeParseError);
    expect(normalized.message).toBe('bad indentation of a mapping entry');
  });

  it('wraps other errors and values', () => {
    const fromError = normalizeError(new TypeError('boom'));
    expect(fromError).toBeInstanceOf(ValidationError);
    expect(fromError.context).toMatchObject({ originalError: 'TypeError' });

    expect(normalizeError('plain text').message).toBe('plain text');
    expect(normalizeError(42).message).toBe('An unexpected error occurred');
    expect(normalizeError(undefined, 'Command failed').message).toBe('Command failed');
  });
});
