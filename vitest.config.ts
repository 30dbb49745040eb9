import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		include: ['tests/**/*.{test,spec}.ts', 'src/**/*.{test,spec}.ts'],
		setupFiles: ['./tests/setup.ts'],
		// Read by src/config.ts at import time, so set before any test file loads
		env: {
			NODE_ENV: 'test',
			BOT_TOKEN: 'test-bot-token',
			GROUP_CHAT_ID: '-100123456789',
			ADMIN_CHAT_ID: '123456789',
			OWNER_ID: '111111111',
			ADMIN_ID: '222222222',
			MODERATOR_ID: '333333333',
			DATABASE_PATH: ':memory:'
		},
		coverage: {
			provider: 'v8',
			reporter: ['text', 'lcov', 'html'],
			include: ['src/**/*.ts'],
			exclude: [
				'src/**/*.d.ts',
				'src/**/*.test.ts',
				'src/**/*.spec.ts',
				'src/bot.ts'
			],
			thresholds: {
				branches: 50,
				functions: 50,
				lines: 50,
				statements: 50
			}
		},
		// Each test file opens its own in-memory database; keep them in one fork
		pool: 'forks',
		poolOptions: {
			forks: {
				singleFork: true
			}
		}
	}
});
