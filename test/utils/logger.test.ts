import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, setLogLevel, setJsonMode } from '../../src/utils/logger.js';

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('logger', () => {
  let write: ReturnType<typeof captureStderr>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T10:00:05.000Z'));
    write = captureStderr();
    setLogLevel('info');
    setJsonMode(false);
  });

  afterEach(() => {
    write.mockRestore();
    vi.useRealTimers();
    setLogLevel('info');
    setJsonMode(false);
  });

  it('writes a tagged line with the bound fields of a child logger', () => {
    const runLog = createLogger('orchestrator').child({ sessionId: 's1' });

    runLog.child({ stage: 'persisting' }).info('Message handled');

    expect(write).toHaveBeenCalledWith(
      '[10:00:05] INFO  [orchestrator] Message handled (sessionId=s1 stage=persisting)\n',
    );
  });

  it('lets fields given at the call override bindings', () => {
    const log = createLogger('fan-out', { stage: 'retrieving' });

    log.warn('web retrieval failed', { stage: 'fusing', code: 'WEB_FAILED' });

    expect(write).toHaveBeenCalledWith(
      '[10:00:05] WARN  [fan-out] web retrieval failed (stage=fusing code=WEB_FAILED)\n',
    );
  });

  it('drops undefined fields and renders objects as JSON', () => {
    createLogger('orchestrator').info('Message handled', { intent: undefined, counts: { ok: 2 } });

    expect(write).toHaveBeenCalledWith('[10:00:05] INFO  [orchestrator] Message handled (counts={"ok":2})\n');
  });

  it('leaves off the field list when there are no fields', () => {
    createLogger('server').error('Listen failed');

    expect(write).toHaveBeenCalledWith('[10:00:05] ERROR [server] Listen failed\n');
  });

  it('filters lines below the configured level', () => {
    const log = createLogger('retry');

    log.debug('persist: retrying');
    setLogLevel('warn');
    log.info('ignored');
    log.warn('persist: attempt 1/2 failed');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[10:00:05] WARN  [retry] persist: attempt 1/2 failed\n');
  });

  it('writes nothing when silent', () => {
    setLogLevel('silent');

    createLogger('retry').error('persist failed');

    expect(write).not.toHaveBeenCalled();
  });

  it('writes one JSON object per line in JSON mode', () => {
    setJsonMode(true);

    createLogger('reply-sink')
      .child({ sessionId: 's1', stage: 'delivering' })
      .warn('Reply webhook unreachable', { error: 'refused', status: undefined });

    expect(write).toHaveBeenCalledWith(
      '{"time":"2026-03-01T10:00:05.000Z","level":"warn","module":"reply-sink",' +
        '"msg":"Reply webhook unreachable","sessionId":"s1","stage":"delivering","error":"refused"}\n',
    );
  });
});
