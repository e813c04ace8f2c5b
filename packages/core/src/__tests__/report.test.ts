import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_RECORD_FAILURES, ExtractionReport } from '../audit-lineage/report.js';

describe('ExtractionReport', () => {
  describe('record failures', () => {
    it('should keep failures up to the limit and count the rest', () => {
      const report = new ExtractionReport(2);

      report.reportRecordFailure('log-1', 'missing job');
      report.reportRecordFailure('log-2', 'missing job');
      report.reportRecordFailure('log-3', 'missing job');
      report.reportRecordFailure('log-4', 'missing job');

      expect([...report.failures.keys()]).toEqual(['log-1', 'log-2']);
      expect(report.numDroppedRecordFailures).toBe(2);
      expect(report.failureCount).toBe(4);
    });

    it('should always keep run-level failures', () => {
      const report = new ExtractionReport(1);
      report.reportRecordFailure('log-1', 'missing job');
      report.reportRecordFailure('log-2', 'missing job');

      report.reportFailure('lineage-gcp-logs', 'AuditLogs error: quota exceeded');

      expect(report.failures.get('lineage-gcp-logs')).toEqual(['AuditLogs error: quota exceeded']);
      expect(report.failureCount).toBe(3);
    });

    it('should default to a bounded limit', () => {
      const report = new ExtractionReport();

      for (let i = 0; i < DEFAULT_MAX_RECORD_FAILURES + 5; i++) {
        report.reportRecordFailure(`log-${i}`, 'missing job');
      }

      expect(report.failures.size).toBe(DEFAULT_MAX_RECORD_FAILURES);
      expect(report.numDroppedRecordFailures).toBe(5);
    });
  });

  describe('recordBuild', () => {
    it('should replace counters and failures with those of the build', () => {
      const report = new ExtractionReport(1);
      report.numTotalLogEntries = 7;
      report.reportFailure('lineage-gcp-logs', 'AuditLogs error: earlier');
      report.recordUpstreamLineage('projects/p/datasets/d/tables/a', 'projects/p/datasets/d/tables/b');

      const build = new ExtractionReport(1);
      build.numTotalLogEntries = 2;
      build.lineageMetadataEntries = 1;
      build.logEntryStartTime = '2024-01-14T23:45:00Z';
      build.reportRecordFailure('log-1', 'missing job');
      build.reportRecordFailure('log-2', 'missing job');

      report.recordBuild(build);

      expect(report.numTotalLogEntries).toBe(2);
      expect(report.lineageMetadataEntries).toBe(1);
      expect(report.logEntryStartTime).toBe('2024-01-14T23:45:00Z');
      expect([...report.failures.entries()]).toEqual([['log-1', ['missing job']]]);
      expect(report.numDroppedRecordFailures).toBe(1);
      expect(report.upstreamLineage.size).toBe(1);
    });

    it('should carry the record failure budget over from the build', () => {
      const report = new ExtractionReport(1);
      const build = new ExtractionReport(1);
      build.reportRecordFailure('log-1', 'missing job');

      report.recordBuild(build);
      report.reportRecordFailure('log-2', 'missing job');

      expect(report.failures.has('log-2')).toBe(false);
      expect(report.numDroppedRecordFailures).toBe(1);
    });
  });
});
