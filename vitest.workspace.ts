import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  // Include all package vitest configs
  'packages/*/vitest.config.ts',
])
