import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { TokenBucketRateLimiter } from '../rate-limiter.js';
import { parseLineageConfig, type LineageConfigInput } from '../audit-lineage/config.js';
import {
  AuditEventSource,
  buildAuditMetadataQuery,
  buildLogFilter,
  formatAuditDateShard,
  formatAuditDateTime,
  type AuditLogSource,
  type AuditTableClient,
} from '../audit-lineage/event-source.js';
import { ExtractionReport } from '../audit-lineage/report.js';
import type { ExportedAuditRow, RawAuditLogEntry } from '../audit-lineage/types.js';

class RecordingLogSource implements AuditLogSource {
  readonly calls: { filter: string; pageSize: number; maxResults?: number }[] = [];

  constructor(private readonly entries: RawAuditLogEntry[]) {}

  async *fetch(filter: string, pageSize: number, maxResults?: number): AsyncGenerator<RawAuditLogEntry> {
    this.calls.push({ filter, pageSize, maxResults });
    yield* this.entries.slice(0, maxResults ?? this.entries.length);
  }
}

class RecordingAuditTableClient implements AuditTableClient {
  readonly queries: string[] = [];

  constructor(private readonly rows: ExportedAuditRow[]) {}

  async *query(sql: string): AsyncGenerator<ExportedAuditRow> {
    this.queries.push(sql);
    yield* this.rows;
  }
}

function entry(insertId: string): RawAuditLogEntry {
  return { logName: 'log', insertId, timestamp: '2024-01-15T10:00:00Z', protoPayload: {} };
}

function row(insertId: string): ExportedAuditRow {
  return { logName: 'log', insertId, timestamp: '2024-01-15T10:00:00Z', metadata: '{}' };
}

function config(overrides: LineageConfigInput = {}) {
  return parseLineageConfig({
    startTime: new Date('2024-01-15T00:00:00Z'),
    endTime: new Date('2024-01-15T12:00:00Z'),
    ...overrides,
  });
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('formatting', () => {
  it('should format timestamps without milliseconds', () => {
    expect(formatAuditDateTime(new Date('2024-01-15T10:20:30.456Z'))).toBe('2024-01-15T10:20:30Z');
  });

  it('should format date shards', () => {
    expect(formatAuditDateShard(new Date('2024-01-05T23:59:59Z'))).toBe('20240105');
  });
});

describe('buildLogFilter', () => {
  const filter = buildLogFilter('2024-01-14T23:45:00Z', '2024-01-15T12:15:00Z');

  it('should bound the window as [start, end)', () => {
    expect(filter).toContain('timestamp >= "2024-01-14T23:45:00Z"');
    expect(filter).toContain('timestamp < "2024-01-15T12:15:00Z"');
  });

  it('should only select completed jobs without errors', () => {
    expect(filter).toContain('protoPayload.metadata.jobChange.job.jobStatus.jobState="DONE"');
    expect(filter).toContain('AND NOT protoPayload.metadata.jobChange.job.jobStatus.errorResult:*');
  });

  it('should exclude anonymous and metadata tables', () => {
    expect(filter).toContain('tables/anon.*');
    expect(filter).toContain('tables/INFORMATION_SCHEMA.*');
    expect(filter).toContain('tables/__TABLES__');
  });
});

describe('buildAuditMetadataQuery', () => {
  const start = new Date('2024-01-14T23:45:00Z');
  const end = new Date('2024-01-15T12:15:00Z');

  it('should query date-sharded tables by suffix', () => {
    const sql = buildAuditMetadataQuery('proj.audit', true, start, end);

    expect(sql).toContain('`proj.audit.cloudaudit_googleapis_com_data_access_*`');
    expect(sql).toContain('_TABLE_SUFFIX BETWEEN "20240114" AND "20240115"');
    expect(sql).toContain('timestamp >= "2024-01-14T23:45:00Z"');
    expect(sql).not.toContain('LIMIT');
  });

  it('should query the partitioned table with a limit', () => {
    const sql = buildAuditMetadataQuery('proj.audit', false, start, end, 1);

    expect(sql).toContain('`proj.audit.cloudaudit_googleapis_com_data_access`');
    expect(sql).not.toContain('_TABLE_SUFFIX');
    expect(sql.endsWith('\nLIMIT 1;')).toBe(true);
  });
});

describe('AuditEventSource', () => {
  describe('readLogEntries', () => {
    it('should pad the window and count entries', async () => {
      const report = new ExtractionReport();
      const logSource = new RecordingLogSource([entry('a'), entry('b')]);
      const source = new AuditEventSource(config({ logPageSize: 50 }), report, { logSource });

      const entries = await collect(source.readLogEntries());

      expect(entries.map((e) => e.insertId)).toEqual(['a', 'b']);
      expect(report.numTotalLogEntries).toBe(2);
      expect(report.logEntryStartTime).toBe('2024-01-14T23:45:00Z');
      expect(report.logEntryEndTime).toBe('2024-01-15T12:15:00Z');
      expect(logSource.calls).toHaveLength(1);
      expect(logSource.calls[0]?.pageSize).toBe(50);
      expect(logSource.calls[0]?.filter).toBe(
        buildLogFilter('2024-01-14T23:45:00Z', '2024-01-15T12:15:00Z')
      );
    });

    it('should pass the limit through', async () => {
      const logSource = new RecordingLogSource([entry('a'), entry('b')]);
      const source = new AuditEventSource(config(), new ExtractionReport(), { logSource });

      const entries = await collect(source.readLogEntries(1));

      expect(entries).toHaveLength(1);
      expect(logSource.calls[0]?.maxResults).toBe(1);
    });

    it('should not touch the source until iterated', () => {
      const logSource = new RecordingLogSource([entry('a')]);
      const source = new AuditEventSource(config(), new ExtractionReport(), { logSource });

      source.readLogEntries();

      expect(logSource.calls).toHaveLength(0);
    });

    it('should fail when no log source is configured', async () => {
      const source = new AuditEventSource(config(), new ExtractionReport(), {});

      await expect(collect(source.readLogEntries())).rejects.toThrow(ConfigurationError);
    });

    it('should wait for a token before fetching', async () => {
      const rateLimiter = TokenBucketRateLimiter.perMinute('test', 60);
      const acquireSpy = vi.spyOn(rateLimiter, 'acquire');
      const source = new AuditEventSource(config(), new ExtractionReport(), {
        logSource: new RecordingLogSource([entry('a')]),
        rateLimiter,
      });

      await collect(source.readLogEntries());

      expect(acquireSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('readExportedAuditRows', () => {
    it('should run one query per dataset', async () => {
      const report = new ExtractionReport();
      const client = new RecordingAuditTableClient([row('r1')]);
      const source = new AuditEventSource(
        config({ auditMetadataDatasets: ['p.audit_a', 'p.audit_b'] }),
        report,
        { auditTableClient: client }
      );

      const rows = await collect(source.readExportedAuditRows());

      expect(rows).toHaveLength(2);
      expect(client.queries).toHaveLength(2);
      expect(client.queries[0]).toContain('`p.audit_a.cloudaudit_googleapis_com_data_access`');
      expect(client.queries[1]).toContain('`p.audit_b.cloudaudit_googleapis_com_data_access`');
      expect(report.auditStartTime).toBe('2024-01-14T23:45:00Z');
      expect(report.auditEndTime).toBe('2024-01-15T12:15:00Z');
    });

    it('should report missing datasets and yield nothing', async () => {
      const report = new ExtractionReport();
      const client = new RecordingAuditTableClient([row('r1')]);
      const source = new AuditEventSource(config(), report, { auditTableClient: client });

      const rows = await collect(source.readExportedAuditRows());

      expect(rows).toEqual([]);
      expect(client.queries).toEqual([]);
      expect(report.auditMetadataDatasetsMissing).toBe(true);
      expect(report.failures.get('audit-metadata')).toEqual(['auditMetadataDatasets not set']);
    });

    it('should throttle each dataset query when rate limiting is enabled', async () => {
      const rateLimiter = TokenBucketRateLimiter.perMinute('test', 60);
      const acquireSpy = vi.spyOn(rateLimiter, 'acquire');
      const source = new AuditEventSource(
        config({ auditMetadataDatasets: ['p.a', 'p.b', 'p.c'] }),
        new ExtractionReport(),
        { auditTableClient: new RecordingAuditTableClient([]), rateLimiter }
      );

      await collect(source.readExportedAuditRows());

      expect(acquireSpy).toHaveBeenCalledTimes(3);
    });
  });
});
