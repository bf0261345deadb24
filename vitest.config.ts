// vitest.config.ts
import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.spec.ts'],
        env: {
            NO_COLOR: '1',
            TREEGEN_LOG_LEVEL: 'silent',
        },
    },
});
