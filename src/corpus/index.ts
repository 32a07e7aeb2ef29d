/**
 * Corpus construction: pipeline stages and the Dataset they produce.
 */

export { DatasetSchema, buildDataset, freezeDataset, type Dataset, type CorpusDocument } from "./dataset.js";
export {
  runPipeline,
  readDirectory,
  filterStopwords,
  combineWords,
  filterRarewords,
  filterCommonwords,
  type PipelineOptions,
} from "./pipeline.js";
