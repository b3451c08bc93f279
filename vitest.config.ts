import os from 'node:os'
import path from 'node:path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NO_COLOR: '1',
      LI_COOKIE_PATH: path.join(os.tmpdir(), `voyager-cookies-vitest-${process.pid}.json`),
    },
    include: ['tests/**/*.test.ts'],
  },
})
