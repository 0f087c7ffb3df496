export {
  runComplianceReview,
  annotatedPathFor,
  PIPELINE_STAGES,
  type PipelineStage,
  type StageStatus,
  type ProgressListener,
  type ReviewOptions,
  type PipelineDependencies,
  type PipelineResult,
} from './review-document'
export {
  loadMappingTable,
  parseMappingTable,
  documentTypesOf,
  mappingValueFor,
  isLocalPath,
  type MappingTable,
} from './mapping-table'
