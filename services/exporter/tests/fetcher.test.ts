import { describe, it, expect } from 'vitest';
import { buildAuditEventsPath, CfAuditEventSource } from '../src/pipeline/fetcher.js';
import { CfCli } from '../src/lib/cfCli.js';
import { FetchError } from '../src/lib/errors.js';
import { trailingWindow } from '../src/lib/exportWindow.js';
import { cfEvent, cfPage, fakeLogger, fakeRunner, RUN_DATE } from './helpers.js';

const window = trailingWindow(RUN_DATE, 7);
const FIRST_PATH = buildAuditEventsPath(window, 2);
const NEXT_HREF = 'https://api.example.test/v3/audit_events?page=2&per_page=2';

function setup(handler: (args: string[]) => string, maxPages = 10) {
  const { runner, calls } = fakeRunner(handler);
  const cli = new CfCli(runner, { binary: 'cf', timeoutMs: 1000, env: {} });
  const logger = fakeLogger();
  const source = new CfAuditEventSource(
    { apiEndpoint: 'https://api.example.test', cli },
    { pageSize: 2, maxPages },
    logger
  );
  return { source, calls, logger };
}

const login = cfEvent({ guid: 'evt-1', createdAt: '2024-06-02T10:00:00Z', type: 'login', actor: 'alice' });
const deletion = cfEvent({
  guid: 'evt-2',
  createdAt: '2024-06-03T11:00:00Z',
  type: 'delete',
  actor: 'bob',
  target: 'app-42',
  data: { reason: 'cleanup' },
});
const update = cfEvent({
  guid: 'evt-3',
  createdAt: '2024-06-05T09:30:00Z',
  type: 'update',
  actor: 'carol',
  target: 'app-42',
  data: { instances: 2 },
});

describe('buildAuditEventsPath', () => {
  it('filters by the window and orders by creation time', () => {
    expect(buildAuditEventsPath(window, 5000)).toBe(
      '/v3/audit_events?created_ats%5Bgte%5D=2024-06-01T00%3A00%3A00Z' +
        '&created_ats%5Blte%5D=2024-06-08T00%3A00%3A00Z&order_by=created_at&per_page=5000'
    );
  });
});

describe('CfAuditEventSource', () => {
  it('returns an empty batch for an empty window', async () => {
    const { source, calls } = setup(() => cfPage([]));

    expect(await source.fetchEvents(window)).toEqual([]);
    expect(calls.map((c) => c.args)).toEqual([['curl', FIRST_PATH]]);
  });

  it('maps Cloud Controller resources to audit events', async () => {
    const { source } = setup(() => cfPage([login, deletion]));

    const events = await source.fetchEvents(window);

    expect(events).toEqual([
      {
        id: 'evt-1',
        timestamp: '2024-06-02T10:00:00Z',
        actor: 'alice',
        action: 'login',
        target: '',
        detail: '{}',
      },
      {
        id: 'evt-2',
        timestamp: '2024-06-03T11:00:00Z',
        actor: 'bob',
        action: 'delete',
        target: 'app-42',
        detail: '{"reason":"cleanup"}',
      },
    ]);
    expect(Object.isFrozen(events[0])).toBe(true);
  });

  it('follows pagination links until the last page', async () => {
    const { source, calls } = setup((args) =>
      args[1] === FIRST_PATH ? cfPage([login, deletion], NEXT_HREF) : cfPage([update])
    );

    const events = await source.fetchEvents(window);

    expect(events.map((e) => e.id)).toEqual(['evt-1', 'evt-2', 'evt-3']);
    expect(calls.map((c) => c.args)).toEqual([
      ['curl', FIRST_PATH],
      ['curl', '/v3/audit_events?page=2&per_page=2'],
    ]);
  });

  it('keeps the first occurrence of an event repeated across pages', async () => {
    const { source } = setup((args) =>
      args[1] === FIRST_PATH ? cfPage([login, deletion], NEXT_HREF) : cfPage([deletion, update])
    );

    const events = await source.fetchEvents(window);

    expect(events.map((e) => e.id)).toEqual(['evt-1', 'evt-2', 'evt-3']);
  });

  it('drops events outside the window', async () => {
    const stale = cfEvent({ guid: 'evt-0', createdAt: '2024-05-20T08:00:00Z', type: 'login', actor: 'dave' });
    const { source, logger } = setup(() => cfPage([stale, login]));

    const events = await source.fetchEvents(window);

    expect(events.map((e) => e.id)).toEqual(['evt-1']);
    expect(logger.warn).toHaveBeenCalledWith(
      { outsideWindow: 1 },
      'Dropped audit events outside the export window'
    );
  });

  it('fails on an API error body', async () => {
    const { source } = setup(() =>
      JSON.stringify({ errors: [{ code: 10002, title: 'CF-NotAuthenticated', detail: 'Authentication error' }] })
    );

    const fetch = source.fetchEvents(window);

    await expect(fetch).rejects.toBeInstanceOf(FetchError);
    await expect(fetch).rejects.toThrow(
      `Cloud Controller rejected ${FIRST_PATH}: CF-NotAuthenticated: Authentication error`
    );
  });

  it('fails on output that is not JSON', async () => {
    const { source } = setup(() => 'FAILED\nNot logged in.');

    await expect(source.fetchEvents(window)).rejects.toThrow(
      `Malformed output from cf curl ${FIRST_PATH}: not JSON`
    );
  });

  it('fails on a page that does not match the schema', async () => {
    const { source } = setup(() => JSON.stringify({ resources: [{ guid: 'evt-1' }] }));

    const fetch = source.fetchEvents(window);

    await expect(fetch).rejects.toBeInstanceOf(FetchError);
    await expect(fetch).rejects.toThrow(/^Malformed audit event page/);
  });

  it('fails when the command fails', async () => {
    const { source } = setup(() => {
      throw new Error('Command "cf curl" failed: timed out after 1000ms');
    });

    await expect(source.fetchEvents(window)).rejects.toThrow(
      `cf curl ${FIRST_PATH} failed: Command "cf curl" failed: timed out after 1000ms`
    );
  });

  it('fails on a pagination loop instead of spinning', async () => {
    const { source, calls } = setup((args) =>
      args[1] === FIRST_PATH ? cfPage([login], NEXT_HREF) : cfPage([deletion], NEXT_HREF)
    );

    await expect(source.fetchEvents(window)).rejects.toThrow(
      'Pagination loop detected at /v3/audit_events?page=2&per_page=2'
    );
    expect(calls).toHaveLength(2);
  });

  it('fails instead of truncating past the page limit', async () => {
    const { source } = setup(() => cfPage([login], NEXT_HREF), 1);

    await expect(source.fetchEvents(window)).rejects.toThrow(
      'Audit events span more than 1 pages; raise EXPORT_MAX_PAGES'
    );
  });
});
