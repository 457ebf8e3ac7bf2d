import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/template-resolver.ts',
        'src/application/condition-evaluator.ts',
        'src/application/action-registry.ts',
        'src/application/workflow-schema.ts',
        'src/application/workflow-registry.ts',
        'src/application/workflow-engine.ts',
        'src/application/event-bus.ts',
        'src/application/invocation-limiter.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
