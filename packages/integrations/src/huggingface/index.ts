export { HuggingFaceHubClient, DEFAULT_HUB_ENDPOINT } from './client.js'
export type { HuggingFaceHubClientConfig } from './client.js'
