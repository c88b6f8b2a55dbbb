import { describe, it, expect, afterEach, vi } from 'vitest';
import { log, simLog, setLogSink, type LogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogSink();
    vi.unstubAllEnvs();
  });

  it('writes one JSON object per line', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const lines: Array<[LogLevel, string]> = [];
    setLogSink((level, line) => lines.push([level, line]));

    simLog.info('engine', 'metronomes locked', { frame: 12 });

    expect(lines).toHaveLength(1);
    const [level, line] = lines[0];
    expect(level).toBe('info');
    const entry = JSON.parse(line);
    expect(entry.level).toBe('info');
    expect(entry.component).toBe('engine');
    expect(entry.msg).toBe('metronomes locked');
    expect(entry.frame).toBe(12);
    expect(typeof entry.ts).toBe('string');
  });

  it('falls back to info for names inherited from Object', () => {
    vi.stubEnv('LOG_LEVEL', 'toString');
    const levels: LogLevel[] = [];
    setLogSink(level => levels.push(level));

    log('debug', 'engine', 'a');
    log('info', 'engine', 'b');

    expect(levels).toEqual(['info']);
  });

  it('drops entries below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const levels: LogLevel[] = [];
    setLogSink(level => levels.push(level));

    log('debug', 'engine', 'a');
    log('info', 'engine', 'b');
    log('warn', 'engine', 'c');
    log('error', 'engine', 'd');

    expect(levels).toEqual(['warn', 'error']);
  });

  it('falls back to info for an unknown LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    const levels: LogLevel[] = [];
    setLogSink(level => levels.push(level));

    simLog.debug('engine', 'hidden');
    simLog.info('engine', 'shown');

    expect(levels).toEqual(['info']);
  });
});
