/**
 * @fileoverview Domain Package Exports
 *
 * Services that answer lineage questions on top of the core pipeline.
 *
 * @module @auditlineage/domain
 *
 * @example
 * ```typescript
 * import { createUpstreamLineageService } from '@auditlineage/domain';
 *
 * const service = createUpstreamLineageService({
 *   config: { tempTablePatterns: ['^stage_'] },
 *   logSource,
 * });
 *
 * const lineage = await service.getUpstreamLineage({
 *   projectId: 'analytics',
 *   dataset: 'sales',
 *   table: 'daily_revenue',
 * });
 * ```
 */

// ============================================================================
// AUDIT LINEAGE
// ============================================================================

export * from './audit-lineage/index.js';
