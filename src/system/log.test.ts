import {setLogLevel} from './config';
import {
  EventParams,
  EventType,
  consoleSink,
  formatEvent,
  logEvent,
  setEventSink,
} from './log';

describe(`logEvent`, () => {
  it(`sends events to the current sink`, () => {
    const events: Array<[EventType, EventParams]> = [];
    const prev = setEventSink((event, params) => events.push([event, params]));
    try {
      logEvent(EventType.SYSTEM, {category: 'test', elapsedMs: 3});
      logEvent(EventType.ERROR);
    } finally {
      setEventSink(prev);
    }
    expect(events).toEqual([
      [EventType.SYSTEM, {category: 'test', elapsedMs: 3}],
      [EventType.ERROR, {}],
    ]);
  });
});

describe(`formatEvent`, () => {
  it(`joins whatever params there are`, () => {
    expect(
      formatEvent(EventType.SYSTEM, {
        category: 'solved standard',
        detail: 'quickly',
        elapsedMs: 0,
      }),
    ).toBe('sdk_system: solved standard: quickly: 0ms');
    expect(formatEvent(EventType.ERROR, {detail: 'oops'})).toBe(
      'sdk_error: oops',
    );
  });
});

describe(`consoleSink`, () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
    error = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel('errors');
    jest.restoreAllMocks();
  });

  it(`writes only errors by default`, () => {
    setLogLevel('errors');
    consoleSink(EventType.SYSTEM, {category: 'quiet'});
    consoleSink(EventType.ERROR, {category: 'loud'});
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('sdk_error: loud');
  });

  it(`writes everything at level all`, () => {
    setLogLevel('all');
    consoleSink(EventType.SYSTEM, {category: 'chatty'});
    expect(log).toHaveBeenCalledWith('sdk_system: chatty');
  });

  it(`writes nothing at level none`, () => {
    setLogLevel('none');
    consoleSink(EventType.ERROR, {category: 'hushed'});
    expect(error).not.toHaveBeenCalled();
  });
});
