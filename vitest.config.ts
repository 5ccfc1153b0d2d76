import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageEntry = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
    resolve: {
        alias: {
            'citrine-shared': packageEntry('citrine-shared'),
            'citrine-batch': packageEntry('citrine-batch'),
            'citrine-gemd': packageEntry('citrine-gemd'),
            'citrine-client': packageEntry('citrine-client')
        }
    },
    test: {
        include: ['tests/**/*.test.ts']
    }
})
