#!/usr/bin/env tsx
/**
 * Installs the current ChromeDriver and checks that it runs.
 *
 * Usage:
 *   npm run ensure-driver              # install into the default cache dir
 *   npm run ensure-driver -- ./drivers # install into ./drivers
 */

import { createProgressLogger } from '@driverdock/core'
import { checkDriverVersion, ensureLatestDriver } from '@driverdock/chromedriver'

const outDir = process.argv[2]

async function main() {
  const driver = await ensureLatestDriver({
    outDir,
    onProgress: createProgressLogger(),
  })
  process.stdout.write('\n')

  await checkDriverVersion(driver.driverPath)
  console.log(`${driver.driverPath} (${driver.version})`)
}

main().catch((error: unknown) => {
  console.error(`✗ ${error instanceof Error ? error.message : String(error)}`)
  process.exit(1)
})
