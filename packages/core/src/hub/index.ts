export { HubSyncAdapter } from './adapter.js'
export type { PushOptions, PullOptions, HubSyncAdapterDeps } from './adapter.js'
export type { DatasetHost, RemoteReference, RemoteLocator } from './host.js'
export {
  buildDataset,
  renderDatasetCard,
  exportedMediaPath,
  parseDatasetInfo,
  parseSplitFile,
  entryToMission,
  DATASET_SCHEMA_VERSION,
  DATASET_INFO_FILE,
  README_FILE,
} from './format.js'
export type { DatasetFile, DatasetInfo, DatasetMissionEntry, ImportedMission, MediaImport, MediaReader } from './format.js'
