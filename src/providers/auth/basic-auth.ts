import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'
import { encodeBase64 } from '../../core/utils.ts'

/** HTTP Basic credentials. */
export class BasicAuth implements TAuthProvider {
  private readonly user: string
  private readonly password: string

  constructor(user: string, password: string) {
    this.user = user
    this.password = password
  }

  apply(request: TOutgoingRequest): void {
    request.headers.set('Authorization', `Basic ${encodeBase64(`${this.user}:${this.password}`)}`)
  }
}
