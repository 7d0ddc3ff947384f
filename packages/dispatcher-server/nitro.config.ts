import { defineNitroConfig } from 'nitropack/config'
import { config as loadEnv } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const currentDir = dirname(fileURLToPath(import.meta.url))
const repoRoot = resolve(currentDir, '..', '..')

for (const dir of [repoRoot, currentDir]) {
  loadEnv({ path: resolve(dir, '.env'), override: false })
  loadEnv({ path: resolve(dir, '.env.local'), override: true })
}

export default defineNitroConfig({
  compatibilityDate: '2025-09-02',
  srcDir: '.',
  alias: {
    '@taskdeck/shared': resolve(repoRoot, 'packages/shared/src/index.ts')
  }
})
