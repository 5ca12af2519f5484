export { buildIndex } from "./build-index";
export {
  type ListClustersInput,
  ListClustersInputSchema,
  listClusters,
} from "./clusters";
export {
  type MergeClustersInput,
  MergeClustersInputSchema,
  mergeClusterGroups,
} from "./merge";
export {
  type RunPipelineInput,
  RunPipelineInputSchema,
  runPipeline,
} from "./run";
export {
  type FindSimilarInput,
  FindSimilarInputSchema,
  findSimilarClusters,
} from "./similar";
export { getRunStatus } from "./status";
