import { Err, Ok } from '../../utils/result.js';
import type { ModuleError, Result } from '../../utils/result.js';

describe('Result', () => {
  const error: ModuleError = { code: 'E-TEST', module: 'M5', data: {}, correlationId: 'doc-1' };

  const unwrap = (result: Result<number, ModuleError[]>): number | string[] => {
    if (result.isSuccess()) {
      return result.value + 1;
    }
    return (result.errors ?? []).map(item => item.code);
  };

  test('should narrow a success to its value', () => {
    const result = Ok(41);

    expect(result.isSuccess()).toBe(true);
    expect(result.isError()).toBe(false);
    expect(unwrap(result)).toBe(42);
  });

  test('should carry the errors of a failure', () => {
    const result = Err([error]);

    expect(result.isSuccess()).toBe(false);
    expect(result.isError()).toBe(true);
    expect(unwrap(result)).toEqual(['E-TEST']);
  });
});
