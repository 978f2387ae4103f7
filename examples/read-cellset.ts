/**
 * Reads a cellset from a local TM1 server.
 *
 * Prerequisites:
 * 1. A TM1 server with its REST API enabled
 * 2. TM1_ADDRESS, TM1_PORT, TM1_USER and TM1_PASSWORD in `.env` (or the shell)
 * 3. Optionally TM1_MDX with the query to run
 *
 * Usage:
 *   npm run example
 */

import { config } from 'dotenv'
import { TM1Client } from '../src/client/tm1.ts'
import { configFromEnvironment } from '../src/core/config.ts'
import { isV12 } from '../src/core/version.ts'

config()

const MDX =
  process.env.TM1_MDX ??
  'SELECT {TM1SUBSETALL([}Clients])} ON 0, {[}ClientProperties].[FullName]} ON 1 FROM [}ClientProperties]'

async function main(): Promise<void> {
  const tm1 = new TM1Client(configFromEnvironment())

  try {
    const version = await tm1.connect()
    const user = await tm1.whoAmI()
    console.log(`Connected to TM1 ${version} as ${user.name} (${user.type})`)

    const cells = await tm1.cells.executeMdx(MDX)
    console.log(`\n${cells.size} cells:`)
    for (const [coordinates, cell] of cells) {
      console.log(`  ${coordinates} = ${String(cell.Value)}`)
    }

    if (!isV12(version)) {
      const threads = await tm1.threads.getActive()
      console.log(`\n${threads.length} active threads`)
    }
  } finally {
    await tm1.close()
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
