import { z } from 'zod';
import { ErrorCodes, buildError, buildOk, mapZodIssues } from '../../../utils/api-response';

describe('api-response helpers', () => {
  it('buildOk returns standard shape', () => {
    const resp = buildOk({ hello: 'world' }, 'req-1');
    expect(resp).toEqual({ success: true, data: { hello: 'world' }, timestamp: expect.any(String), requestId: 'req-1' });
  });

  it('buildOk omits a missing request ID', () => {
    expect(buildOk(1)).not.toHaveProperty('requestId');
  });

  it('buildError returns standard error shape', () => {
    const resp = buildError(ErrorCodes.VALIDATION_ERROR, 'Bad input', { field: 'name' }, 'abc');
    expect(resp).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Bad input', details: { field: 'name' } },
      timestamp: expect.any(String),
      requestId: 'abc',
    });
  });

  it('mapZodIssues returns normalized issue list', () => {
    const schema = z.object({ n: z.number().int().min(1) });
    const result = schema.safeParse({ n: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(mapZodIssues(result.error)).toEqual({
        issues: [{ path: 'n', message: expect.any(String), code: 'too_small' }],
      });
    }
  });
});
