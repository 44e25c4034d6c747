/**
 * Dataset host contract. The Hugging Face client in the integrations package implements it.
 */

import type { Result } from '../common/index.js'
import type { StudioError } from '../common/index.js'
import type { DatasetFile } from './format.js'

export interface RemoteReference {
  repoId: string
  /** Commit id, or a branch name when pulling. */
  revision: string
  url: string
}

export interface RemoteLocator {
  repoId: string
  revision?: string
}

export interface DatasetHost {
  /** Create the dataset repository if it does not exist. */
  ensureRepo(repoId: string, options: { private: boolean }): Promise<Result<void, StudioError>>
  /** Replace the repository contents with `files` in one commit. */
  upload(repoId: string, files: DatasetFile[], message: string): Promise<Result<RemoteReference, StudioError>>
  listFiles(locator: RemoteLocator): Promise<Result<string[], StudioError>>
  /** NOT_FOUND when the file does not exist. */
  download(locator: RemoteLocator, path: string): Promise<Result<Uint8Array, StudioError>>
}
