import { TM1Client, type TTM1ClientOptions } from './tm1.ts'

const SAAS_HOST_SUFFIX = 'planninganalytics.saas.ibm.com'

export type TTM1CloudOptions = Omit<
  TTM1ClientOptions,
  'address' | 'baseUrl' | 'authUrl' | 'tenant' | 'database' | 'apiKey' | 'instance' | 'port' | 'ssl'
> & {
  /** Region prefix of the Planning Analytics host, e.g. `us-east-1`. */
  region: string
  tenant: string
  database: string
  apiKey: string
}

/**
 * TM1Client pre-configured for Planning Analytics as a Service.
 *
 * @example
 * ```typescript
 * const tm1 = new TM1Cloud({
 *   region: 'us-east-1',
 *   tenant: 'TENANT1',
 *   database: 'Planning Sample',
 *   apiKey: process.env.TM1_API_KEY ?? '',
 * })
 *
 * const version = await tm1.version()
 * ```
 */
export class TM1Cloud extends TM1Client {
  constructor(options: TTM1CloudOptions) {
    const { region, ...rest } = options
    super({
      ...rest,
      address: `${region}.${SAAS_HOST_SUFFIX}`,
      ssl: true,
    })
  }
}
