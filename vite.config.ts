import path from 'path';

import tailwindcss from '@tailwindcss/vite';
import react from '@vitejs/plugin-react';
import { defineConfig, loadEnv, type PluginOption } from 'vite';
import { configDefaults } from 'vitest/config';

export default defineConfig(async ({ mode }) => {
    const env = loadEnv(mode, '.', '');
    const isTest = mode === 'test' || Boolean(process.env.VITEST);
    const plugins: PluginOption[] = [];
    plugins.push(...(react() as PluginOption[]));
    if (!isTest) {
        plugins.push(tailwindcss());
        try {
            const { default: checker } = await import('vite-plugin-checker');
            const ch = checker({ typescript: true }) as PluginOption;
            if (Array.isArray(ch)) plugins.push(...ch);
            else plugins.push(ch);
        } catch (error) {
            console.warn('vite-plugin-checker unavailable, skipping type-check overlay', error);
        }
    }
    return {
        server: {
            port: 3000,
            host: '0.0.0.0',
        },
        plugins,
        define: {
            'process.env.FACE_DETECTOR_WORKER_URL': JSON.stringify(
                env.FACE_DETECTOR_WORKER_URL ?? '',
            ),
        },
        resolve: {
            alias: {
                '@': path.resolve(__dirname, 'src'),
            },
        },
        test: {
            globals: true,
            environment: 'jsdom',
            setupFiles: ['vitest.setup.ts'],
            include: ['src/**/*.test.{ts,tsx}'],
            exclude: configDefaults.exclude,
        },
    };
});
