import { jest } from '@jest/globals';
import { DownloadError, FormError, InvalidInputError, NavigationError, handleError } from './errors';
import { resetLogger } from './logger';

describe('handleError', () => {
  let exit: jest.SpiedFunction<typeof process.exit>;
  let errors: string[];

  beforeEach(() => {
    resetLogger();
    errors = [];
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
      errors.push(String(line));
    });
    exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it.each([
    [InvalidInputError.fromLast4('12'), 1],
    [NavigationError.fromMissingLink('Validate a Certificate of Clean Hands'), 2],
    [FormError.fromField('notice number'), 3],
    [DownloadError.fromEmptyBody('https://mytax.dc.gov/_/doc.pdf'), 4],
  ])('should exit with the code of %s', (error, code) => {
    expect(() => handleError(error)).toThrow(`exit ${code}`);
    expect(exit).toHaveBeenCalledWith(code);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain(error.message);
  });

  it('should exit with 1 for unexpected errors', () => {
    expect(() => handleError(new Error('socket hang up'))).toThrow('exit 1');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain('Unexpected error: socket hang up');
  });

  it('should exit with 1 for thrown non-errors', () => {
    expect(() => handleError('boom')).toThrow('exit 1');
    expect(errors[0]).toContain('Unexpected error: boom');
  });
});
