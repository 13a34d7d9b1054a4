import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { log, logger, logAuthFailure, logAuthzFailure, type RequestLogEntry } from './logger';

function parseCall(spy: MockInstance<typeof process.stdout.write>, index = 0): Record<string, unknown> {
  return JSON.parse((spy.mock.calls[index][0] as string).trim());
}

describe('log', () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
  });

  it('writes a JSON line to stdout with all required fields', () => {
    const entry: RequestLogEntry = {
      method: 'POST',
      path: '/api/v1/search/reindex',
      statusCode: 202,
      responseTime: 42,
      requestId: 'req-1',
    };

    log(entry);

    expect(stdoutSpy).toHaveBeenCalledOnce();
    const output = stdoutSpy.mock.calls[0][0] as string;
    expect(output.endsWith('\n')).toBe(true);

    const parsed = parseCall(stdoutSpy);
    expect(parsed.method).toBe('POST');
    expect(parsed.path).toBe('/api/v1/search/reindex');
    expect(parsed.statusCode).toBe(202);
    expect(parsed.responseTime).toBe(42);
    expect(parsed.requestId).toBe('req-1');
    expect(parsed.level).toBe('info');
    expect(parsed.service).toBe('catalog-reindexer');
    expect(parsed.timestamp).toBeDefined();
  });

  it('omits requestId when none is set', () => {
    log({ method: 'GET', path: '/api/v1/health', statusCode: 200, responseTime: 1 });

    expect(parseCall(stdoutSpy)).not.toHaveProperty('requestId');
  });
});

describe('logger', () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let stderrSpy: MockInstance<typeof process.stderr.write>;
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('info writes JSON to stdout with level info', () => {
    logger.info('ReindexService: job started', { runMode: 'BATCH' });

    expect(stdoutSpy).toHaveBeenCalledOnce();
    const parsed = parseCall(stdoutSpy);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('ReindexService: job started');
    expect(parsed.runMode).toBe('BATCH');
    expect(parsed.timestamp).toBeDefined();
  });

  it('warn writes JSON to stderr with level warn', () => {
    logger.warn('IndexLifecycle: index creation failed');

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(stderrSpy).toHaveBeenCalledOnce();
    const parsed = parseCall(stderrSpy);
    expect(parsed.level).toBe('warn');
    expect(parsed.message).toBe('IndexLifecycle: index creation failed');
  });

  it('error writes JSON to stderr with level error', () => {
    logger.error('connection failed', { host: 'search.local' });

    expect(stderrSpy).toHaveBeenCalledOnce();
    const parsed = parseCall(stderrSpy);
    expect(parsed.level).toBe('error');
    expect(parsed.message).toBe('connection failed');
    expect(parsed.host).toBe('search.local');
  });

  it('drops debug lines at the default level', () => {
    logger.debug('noise');

    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('honours LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';

    logger.info('hidden');
    logger.warn('hidden');
    logger.error('shown');

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(stderrSpy).toHaveBeenCalledOnce();
    expect(parseCall(stderrSpy).message).toBe('shown');
  });

  it('falls back to info for an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'verbose';

    logger.debug('hidden');
    logger.info('shown');

    expect(stdoutSpy).toHaveBeenCalledOnce();
    expect(parseCall(stdoutSpy).message).toBe('shown');
  });
});

describe('security events', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
  });

  it('logs authentication failures with the event type', () => {
    logAuthFailure({ sourceIp: '10.0.0.1', reason: 'Invalid token' });

    const parsed = parseCall(stderrSpy);
    expect(parsed.message).toBe('Security event: authentication failure');
    expect(parsed.event_type).toBe('auth_failure');
    expect(parsed.sourceIp).toBe('10.0.0.1');
    expect(parsed.reason).toBe('Invalid token');
  });

  it('logs authorization failures with the user and resource', () => {
    logAuthzFailure({ userName: 'alice', resource: '/api/v1/search/reindex', reason: 'Admin privileges required' });

    const parsed = parseCall(stderrSpy);
    expect(parsed.event_type).toBe('authz_failure');
    expect(parsed.userName).toBe('alice');
    expect(parsed.resource).toBe('/api/v1/search/reindex');
  });
});
