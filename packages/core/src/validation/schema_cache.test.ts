import { SchemaValidationCache, validateSchema } from './schema_cache';
import { SchemaValidationError } from './errors';

type StatusShape = { context: string; state: string; sha: string };

describe('SchemaValidationCache', () => {
  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('compiles a schema once and reuses it', () => {
    const first = SchemaValidationCache.getValidator('status_event');
    const second = SchemaValidationCache.getValidator('status_event');
    expect(second).toBe(first);
  });

  it('returns valid data unchanged', () => {
    const event = { context: 'ci', state: 'pending', sha: 'abc1234' };
    expect(validateSchema<StatusShape>('status_event', event)).toBe(event);
  });

  it('lists every failing field', () => {
    const error = (() => {
      try {
        validateSchema('status_event', { context: '', sha: 'not-a-sha' });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(SchemaValidationError);
    const fields = (error as SchemaValidationError).errors.map((e) => e.field).sort();
    expect(fields).toEqual(['/', '/context', '/sha']);
  });
});
