import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'
import { encodeBase64 } from '../../core/utils.ts'

/** CAM security with a namespace: `CAMNamespace base64(user:password:namespace)`. */
export class CamNamespaceAuth implements TAuthProvider {
  private readonly token: string

  constructor(user: string, password: string, namespace: string) {
    this.token = encodeBase64(`${user}:${password}:${namespace}`)
  }

  apply(request: TOutgoingRequest): void {
    request.headers.set('Authorization', `CAMNamespace ${this.token}`)
  }
}

/** Pre-issued CAM passport. */
export class CamPassportAuth implements TAuthProvider {
  private readonly passport: string

  constructor(passport: string) {
    this.passport = passport
  }

  apply(request: TOutgoingRequest): void {
    request.headers.set('Authorization', `CAMPassport ${this.passport}`)
  }
}
