import { ConsoleLogger } from './consoleLogger';
import type { RunStarted } from '../types/events';

const event: RunStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: { url: 'https://git.example.com/org/myrepo.git', branch: 'main', dryRun: false },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs and traces events as JSON in verbose mode', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));

    logger.trace(event, 'hello');
    expect(logSpy).toHaveBeenCalledWith('hello', JSON.stringify(event));
  });

  it('keeps events and debug output quiet by default', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    logger.debug('prompt text');
    logger.trace(event, 'hello');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('hello');
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ repo: 'myrepo' }).child({ branch: 'main' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[repo=myrepo branch=main] hello');

    logger.child({ env: 'dev' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[env=dev] warn');
  });
});
