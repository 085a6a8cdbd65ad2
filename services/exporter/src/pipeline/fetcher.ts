import type { Logger } from 'pino';
import type { CfSession } from './authenticator.js';
import {
  CfAuditEventPageSchema,
  CfErrorBodySchema,
  toAuditEvent,
  type AuditEvent,
  type CfAuditEventPage,
  type ExportBatch,
} from '../lib/auditEvent.js';
import { FetchError, errorMessage } from '../lib/errors.js';
import { formatUtcSeconds, isWithinWindow, type ExportWindow } from '../lib/exportWindow.js';

/**
 * The single capability the pipeline needs from the audit log provider.
 */
export interface AuditEventSource {
  fetchEvents(window: ExportWindow): Promise<ExportBatch>;
}

export interface CfAuditEventSourceOptions {
  /** `per_page`, at most 5000 */
  pageSize: number;
  /** Safety limit; exceeding it fails the fetch instead of truncating */
  maxPages: number;
}

export const AUDIT_EVENTS_PATH = '/v3/audit_events';

export function buildAuditEventsPath(window: ExportWindow, pageSize: number): string {
  const params = new URLSearchParams({
    'created_ats[gte]': formatUtcSeconds(window.from),
    'created_ats[lte]': formatUtcSeconds(window.to),
    order_by: 'created_at',
    per_page: String(pageSize),
  });
  return `${AUDIT_EVENTS_PATH}?${params.toString()}`;
}

/**
 * Reads audit events from the Cloud Controller v3 API through `cf curl`,
 * following pagination links until the last page.
 *
 * Events are de-duplicated by GUID (first occurrence wins) because pages can
 * shift while new events are recorded. Events outside the window are dropped.
 */
export class CfAuditEventSource implements AuditEventSource {
  constructor(
    private readonly session: CfSession,
    private readonly options: CfAuditEventSourceOptions,
    private readonly logger: Logger
  ) {}

  async fetchEvents(window: ExportWindow): Promise<ExportBatch> {
    const events: AuditEvent[] = [];
    const seenIds = new Set<string>();
    const visited = new Set<string>();
    let outsideWindow = 0;
    let duplicates = 0;

    let path: string | null = buildAuditEventsPath(window, this.options.pageSize);

    while (path !== null) {
      if (visited.has(path)) {
        throw new FetchError(`Pagination loop detected at ${path}`);
      }
      if (visited.size >= this.options.maxPages) {
        throw new FetchError(
          `Audit events span more than ${this.options.maxPages} pages; raise EXPORT_MAX_PAGES`
        );
      }
      visited.add(path);

      const page = await this.fetchPage(path);

      for (const resource of page.resources) {
        const event = toAuditEvent(resource);

        if (seenIds.has(event.id)) {
          duplicates++;
          continue;
        }
        seenIds.add(event.id);

        if (!isWithinWindow(window, new Date(event.timestamp))) {
          outsideWindow++;
          continue;
        }

        events.push(event);
      }

      this.logger.debug(
        { path, pageEvents: page.resources.length, totalResults: page.pagination.total_results },
        'Fetched audit event page'
      );

      path = page.pagination.next ? toRequestPath(page.pagination.next.href) : null;
    }

    if (outsideWindow > 0) {
      this.logger.warn({ outsideWindow }, 'Dropped audit events outside the export window');
    }
    if (duplicates > 0) {
      this.logger.debug({ duplicates }, 'Dropped duplicate audit events');
    }

    this.logger.info(
      { from: window.from.toISOString(), to: window.to.toISOString(), count: events.length, pages: visited.size },
      'Audit events fetched'
    );

    return events;
  }

  private async fetchPage(path: string): Promise<CfAuditEventPage> {
    let output: string;
    try {
      output = await this.session.cli.curl(path);
    } catch (error: unknown) {
      throw new FetchError(`cf curl ${path} failed: ${errorMessage(error)}`, { cause: error });
    }

    let body: unknown;
    try {
      body = JSON.parse(output);
    } catch (error: unknown) {
      throw new FetchError(`Malformed output from cf curl ${path}: not JSON`, { cause: error });
    }

    const apiError = CfErrorBodySchema.safeParse(body);
    if (apiError.success) {
      const details = apiError.data.errors
        .map((e) => [e.title, e.detail].filter(Boolean).join(': '))
        .join('; ');
      throw new FetchError(`Cloud Controller rejected ${path}: ${details}`);
    }

    const page = CfAuditEventPageSchema.safeParse(body);
    if (!page.success) {
      throw new FetchError(`Malformed audit event page from ${path}: ${page.error.message}`, {
        cause: page.error,
      });
    }

    return page.data;
  }
}

/**
 * `next.href` is an absolute URL; `cf curl` wants the path and query.
 */
function toRequestPath(href: string): string {
  let url: URL;
  try {
    url = new URL(href);
  } catch (error: unknown) {
    throw new FetchError(`Malformed pagination link: ${href}`, { cause: error });
  }
  return `${url.pathname}${url.search}`;
}
