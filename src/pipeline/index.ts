/**
 * Biomarker pipeline exports
 * @module pipeline
 */

export { BiomarkerPipeline, type BiomarkerPipelineOptions, type SnapshotListener } from './biomarker-pipeline';
