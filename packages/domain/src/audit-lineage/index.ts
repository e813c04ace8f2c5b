export {
  UpstreamLineageService,
  createUpstreamLineageService,
  LOG_SOURCE_FAILURE_KEY,
  AUDIT_TABLE_SOURCE_FAILURE_KEY,
  type UpstreamEdge,
  type UpstreamLineage,
  type UpstreamLineageServiceDependencies,
} from './upstream-lineage-service.js';
