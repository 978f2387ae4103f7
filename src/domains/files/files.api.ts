import { withHeader } from '../../core/request-options.ts'
import { Transport } from '../../core/transport.ts'
import type { TContentEntry } from '../../types/api.ts'

export type TFilesApiOptions = {
  transport: Transport
}

export type TFileContent = string | Uint8Array | Blob

export type TDocumentBody = {
  '@odata.type': '#ibm.tm1.api.v1.Document'
  ID: string
  Name: string
}

function toBlob(content: TFileContent): Blob {
  if (content instanceof Blob) return content
  return new Blob([typeof content === 'string' ? content : content.slice()])
}

/**
 * Minimal files HTTP client. Endpoints are content paths such as
 * `Contents('Files')/Contents('reports')`.
 */
export interface TFilesApi {
  getTree(endpoint: string, signal?: AbortSignal): Promise<TContentEntry>
  getContent(endpoint: string, signal?: AbortSignal): Promise<Uint8Array>
  createDocument(folderEndpoint: string, body: TDocumentBody, signal?: AbortSignal): Promise<void>
  updateContent(endpoint: string, content: TFileContent, signal?: AbortSignal): Promise<void>
  get(endpoint: string, signal?: AbortSignal): Promise<void>
  delete(endpoint: string, signal?: AbortSignal): Promise<void>
}

export class FilesApi implements TFilesApi {
  private transport: Transport

  constructor(options: TFilesApiOptions) {
    this.transport = options.transport
  }

  public async getTree(endpoint: string, signal?: AbortSignal): Promise<TContentEntry> {
    return this.transport.requestJson<TContentEntry>('GET', endpoint, { signal })
  }

  public async getContent(endpoint: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.transport.request('GET', `${endpoint}/Content`, { signal })
    return new Uint8Array(await response.arrayBuffer())
  }

  public async createDocument(
    folderEndpoint: string,
    body: TDocumentBody,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('POST', `${folderEndpoint}/Contents`, { body, signal })
  }

  public async updateContent(
    endpoint: string,
    content: TFileContent,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('PATCH', `${endpoint}/Content`, {
      body: toBlob(content),
      signal,
      requestOptions: [withHeader('Content-Type', 'application/octet-stream')],
    })
  }

  public async get(endpoint: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('GET', endpoint, { signal })
  }

  public async delete(endpoint: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('DELETE', endpoint, { signal })
  }
}
