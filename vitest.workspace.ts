import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/shared/vitest.config.ts',
  'packages/core/vitest.config.unit.ts',
  'packages/core/vitest.config.integration.ts',
]);
