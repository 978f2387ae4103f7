import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'

export class HeaderAuth implements TAuthProvider {
  private readonly headers: Record<string, string>

  constructor(headers: Record<string, string>) {
    this.headers = { ...headers }
  }

  apply(request: TOutgoingRequest): void {
    for (const [name, value] of Object.entries(this.headers)) {
      request.headers.set(name, value)
    }
  }
}
