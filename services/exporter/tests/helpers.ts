import { vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandOptions, CommandResult, CommandRunner } from '../src/lib/commandRunner.js';
import type { AuditEvent } from '../src/lib/auditEvent.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'audit-export-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface RecordedCall {
  file: string;
  args: string[];
  options: CommandOptions | undefined;
}

/**
 * Command runner that answers from `handler` (stdout) and records calls.
 * Throw from the handler to simulate a failing command.
 */
export function fakeRunner(handler: (args: string[]) => string) {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = {
    async run(file, args, options): Promise<CommandResult> {
      calls.push({ file, args: [...args], options });
      return { stdout: handler([...args]), stderr: '' };
    },
  };
  return { runner, calls };
}

interface CfEventInput {
  guid: string;
  createdAt: string;
  type: string;
  actor: string;
  target?: string;
  data?: Record<string, unknown>;
}

/** Cloud Controller v3 audit event resource */
export function cfEvent(input: CfEventInput) {
  return {
    guid: input.guid,
    created_at: input.createdAt,
    updated_at: input.createdAt,
    type: input.type,
    actor: { guid: `actor-${input.actor}`, type: 'user', name: input.actor },
    target: { guid: `target-${input.guid}`, type: 'app', name: input.target ?? '' },
    data: input.data ?? {},
    space: { guid: 'space-1' },
    organization: { guid: 'org-1' },
    links: {},
  };
}

export function cfPage(resources: unknown[], nextHref: string | null = null): string {
  return JSON.stringify({
    pagination: {
      total_results: resources.length,
      total_pages: 1,
      first: { href: 'https://api.example.test/v3/audit_events?page=1' },
      last: { href: 'https://api.example.test/v3/audit_events?page=1' },
      next: nextHref ? { href: nextHref } : null,
      previous: null,
    },
    resources,
  });
}

/** The three events of the documented example week */
export const sampleEvents: AuditEvent[] = [
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
  {
    id: 'evt-3',
    timestamp: '2024-06-05T09:30:00Z',
    actor: 'carol',
    action: 'update',
    target: 'app-42',
    detail: '{"instances":2}',
  },
];

export const SAMPLE_RAW_CSV =
  'timestamp,actor,action,target,detail\n' +
  '2024-06-02T10:00:00Z,alice,login,,{}\n' +
  '2024-06-03T11:00:00Z,bob,delete,app-42,"{""reason"":""cleanup""}"\n' +
  '2024-06-05T09:30:00Z,carol,update,app-42,"{""instances"":2}"\n';

export const RUN_DATE = new Date('2024-06-08T00:00:00Z');
