import { defineConfig } from 'vitest/config'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'

import dotenv from 'dotenv'

const testEnv = dotenv.config({
    path: '.env.test'
}).parsed ?? {}

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['src/**/*.test.ts'],
        env: {
            ...testEnv,
            VNLAUNCH_HOME_DIR: join(tmpdir(), `vnlaunch-vitest-${process.pid}`),
        }
    },
    resolve: {
        alias: {
            '@': resolve('./src'),
        },
    },
})
