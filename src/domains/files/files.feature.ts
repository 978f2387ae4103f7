import { isNotFound, ValidationError } from '../../core/errors.ts'
import type { TVersionProvider } from '../../core/types.ts'
import { odataKey } from '../../core/utils.ts'
import { isV12 } from '../../core/version.ts'
import type { TContentEntry } from '../../types/api.ts'
import type { TFileContent, TFilesApi } from './files.api.ts'

export type TFilesFeatureOptions = {
  api: TFilesApi
  getVersion: TVersionProvider
}

export type TContentRoot = 'Files' | 'Blobs'

/** `reports/2025/plan.csv` style paths of everything below `entry`. */
export function flattenContentNames(entry: TContentEntry, parentPath = ''): string[] {
  const names: string[] = []
  for (const child of entry.Contents ?? []) {
    const path = parentPath ? `${parentPath}/${child.Name}` : child.Name
    names.push(path, ...flattenContentNames(child, path))
  }
  return names
}

export function contentsEndpoint(root: TContentRoot, folders: string[] = []): string {
  return [root, ...folders].map((segment) => `Contents('${odataKey(segment)}')`).join('/')
}

/** Listing endpoint that expands `depth` levels of nested folders below the first. */
export function contentTreeEndpoint(root: TContentRoot, depth: number): string {
  const levels = Math.max(0, depth)
  return (
    `${contentsEndpoint(root)}?$select=ID,Name&$expand=tm1.Folder/Contents` +
    '($select=ID,Name;$expand=tm1.Folder/Contents'.repeat(levels) +
    ')'.repeat(levels)
  )
}

/**
 * Files in the server's content store. v12 servers keep them under `Files` with
 * nested folders; older servers under `Blobs`, flat.
 */
export class FilesFeature {
  private readonly api: TFilesApi
  private readonly getVersion: TVersionProvider

  constructor(options: TFilesFeatureOptions) {
    this.api = options.api
    this.getVersion = options.getVersion
  }

  async contentRoot(signal?: AbortSignal): Promise<TContentRoot> {
    return isV12(await this.getVersion(signal)) ? 'Files' : 'Blobs'
  }

  async getAllNames(depth = 0, signal?: AbortSignal): Promise<string[]> {
    const root = await this.contentRoot(signal)
    const levels = root === 'Blobs' ? 0 : depth
    return flattenContentNames(await this.api.getTree(contentTreeEndpoint(root, levels), signal))
  }

  async get(fileName: string, folders: string[] = [], signal?: AbortSignal): Promise<Uint8Array> {
    return this.api.getContent(await this.fileEndpoint(fileName, folders, signal), signal)
  }

  async create(
    fileName: string,
    content: TFileContent,
    folders: string[] = [],
    signal?: AbortSignal,
  ): Promise<void> {
    this.validateName(fileName)
    const folder = contentsEndpoint(await this.contentRoot(signal), folders)
    await this.api.createDocument(
      folder,
      { '@odata.type': '#ibm.tm1.api.v1.Document', ID: fileName, Name: fileName },
      signal,
    )
    await this.update(fileName, content, folders, signal)
  }

  /** Replaces the content of an existing file. */
  async update(
    fileName: string,
    content: TFileContent,
    folders: string[] = [],
    signal?: AbortSignal,
  ): Promise<void> {
    this.validateName(fileName)
    const endpoint = await this.fileEndpoint(fileName, folders, signal)
    if (!(await this.existsAt(endpoint, signal))) {
      throw new ValidationError(`file ${[...folders, fileName].join('/')} does not exist`)
    }
    await this.api.updateContent(endpoint, content, signal)
  }

  async updateOrCreate(
    fileName: string,
    content: TFileContent,
    folders: string[] = [],
    signal?: AbortSignal,
  ): Promise<void> {
    if (await this.exists(fileName, folders, signal)) {
      await this.update(fileName, content, folders, signal)
      return
    }
    await this.create(fileName, content, folders, signal)
  }

  async exists(fileName: string, folders: string[] = [], signal?: AbortSignal): Promise<boolean> {
    return this.existsAt(await this.fileEndpoint(fileName, folders, signal), signal)
  }

  async delete(fileName: string, folders: string[] = [], signal?: AbortSignal): Promise<void> {
    await this.api.delete(await this.fileEndpoint(fileName, folders, signal), signal)
  }

  private async fileEndpoint(fileName: string, folders: string[], signal?: AbortSignal): Promise<string> {
    return contentsEndpoint(await this.contentRoot(signal), [...folders, fileName])
  }

  private async existsAt(endpoint: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.api.get(endpoint, signal)
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  private validateName(fileName: string): void {
    if (!fileName.trim()) throw new ValidationError('file name cannot be empty')
  }
}
