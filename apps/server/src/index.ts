export { createStudioServer, statusFor, MAX_BODY_BYTES } from './server.js'
export { buildServices, defaultFactories } from './services.js'
export type { Services, ServiceFactories, BuildServicesOptions } from './services.js'
export { DraftRegistry, viewDraft, MAX_OPEN_DRAFTS } from './drafts.js'
export type { DraftSession, DraftView } from './drafts.js'
export { parseServerConfig, dataPaths, USAGE, DEFAULT_PORT, DEFAULT_HOST, DEFAULT_DATA_DIR } from './config.js'
export type { ServerConfig, DataPaths } from './config.js'
