import { afterEach, describe, expect, it, vi } from 'vitest';

import type { LogMessage, Transport } from './interfaces';
import { Logger } from './logger';
import { ConsoleTransport, formatJsonLine } from './transports/console';

class CaptureTransport implements Transport {
  readonly messages: LogMessage[] = [];

  log(message: LogMessage): void {
    this.messages.push(message);
  }
}

class RouteTable {}

describe('Logger', () => {
  afterEach(() => {
    Logger.useTransport();
    Logger.configure({ level: 'info' });
    vi.restoreAllMocks();
  });

  it('should drop records below the configured level', () => {
    const transport = new CaptureTransport();
    Logger.useTransport(transport);
    Logger.configure({ level: 'warn' });
    const logger = new Logger('test');

    logger.info('ignored');
    logger.warn('kept');

    expect(transport.messages.map(message => message.msg)).toEqual(['kept']);
  });

  it('should derive the context from a class or an instance', () => {
    const transport = new CaptureTransport();
    Logger.useTransport(transport);

    new Logger(RouteTable).info('from class');
    new Logger(new RouteTable()).info('from instance');

    expect(transport.messages.map(message => message.context)).toEqual(['RouteTable', 'RouteTable']);
  });

  it('should merge metadata, loggables and errors into the record', () => {
    const transport = new CaptureTransport();
    Logger.useTransport(transport);
    const failure = new Error('boom');

    new Logger('test').error('failed', { routes: 3 }, { toLog: () => ({ index: 'trie' }) }, failure);

    const [message] = transport.messages;
    expect(message?.level).toBe('error');
    expect(message?.routes).toBe(3);
    expect(message?.index).toBe('trie');
    expect(message?.err).toBe(failure);
  });

  it('should report whether a level is enabled', () => {
    Logger.configure({ level: 'debug' });

    expect(Logger.isLevelEnabled('trace')).toBe(false);
    expect(Logger.isLevelEnabled('debug')).toBe(true);
    expect(Logger.isLevelEnabled('fatal')).toBe(true);
  });
});

describe('ConsoleTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line per record in json format', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const transport = new ConsoleTransport({ format: 'json' });

    transport.log({ level: 'info', msg: 'built', time: 0, context: 'router', endpoints: 2 });

    expect(write).toHaveBeenCalledWith('{"level":"info","msg":"built","time":0,"context":"router","endpoints":2}\n');
  });

  it('should expand errors when serializing', () => {
    const error = new Error('bad pattern');
    error.stack = 'stack';

    expect(formatJsonLine({ err: error })).toBe('{"err":{"name":"Error","message":"bad pattern","stack":"stack"}}');
  });

  it('should print pretty lines through the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const transport = new ConsoleTransport({ format: 'pretty' });

    transport.log({ level: 'warn', msg: 'anchors stripped', time: 0 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toContain('anchors stripped');
  });
});
