/**
 * @mission-studio/integrations: clients for external services.
 */

export { HuggingFaceHubClient, DEFAULT_HUB_ENDPOINT } from './huggingface/index.js'
export type { HuggingFaceHubClientConfig } from './huggingface/index.js'
