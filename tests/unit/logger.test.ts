import { Logger, type LogSink } from '../../src/utils/logger';

function createSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return { lines, write: (line: string) => { lines.push(line); } };
}

describe('Logger', () => {
  it('drops entries below the configured level', () => {
    const sink = createSink();
    const log = new Logger({ level: 'warn', format: 'text', sink });

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');

    expect(sink.lines).toHaveLength(2);
  });

  it('formats text entries with scope and context', () => {
    const sink = createSink();
    const log = new Logger({ level: 'debug', format: 'text', scope: 'detector', sink });

    log.info('Detected UTF-8', { bytes: 3 });

    expect(sink.lines[0]).toMatch(/^\S+ INFO \[detector\] Detected UTF-8 \{"bytes":3\}$/);
  });

  it('formats JSON entries', () => {
    const sink = createSink();
    const log = new Logger({ level: 'debug', format: 'json', sink });

    log.debug('Read 3 bytes', { filePath: 'a.txt' });

    const entry = JSON.parse(sink.lines[0]);
    expect(entry).toMatchObject({ level: 'debug', message: 'Read 3 bytes', filePath: 'a.txt' });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('nests child scopes and shares the sink', () => {
    const sink = createSink();
    const child = new Logger({ level: 'info', format: 'text', scope: 'cli', sink }).child('detect');

    child.warn('careful');

    expect(sink.lines[0]).toMatch(/ WARN \[cli:detect\] careful$/);
  });

  it('silences everything at the silent level', () => {
    const sink = createSink();
    const log = new Logger({ level: 'silent', format: 'text', sink });

    log.error('nothing');

    expect(sink.lines).toEqual([]);
    expect(log.isLevelEnabled('error')).toBe(false);
  });

  it('can be reconfigured', () => {
    const sink = createSink();
    const log = new Logger({ level: 'error', format: 'text', sink });

    log.configure({ logLevel: 'debug', logFormat: 'json' });
    log.debug('now visible');

    expect(log.getLevel()).toBe('debug');
    expect(JSON.parse(sink.lines[0]).message).toBe('now visible');
  });
});
