import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/layout-xml/vitest.config.ts',
  'packages/export/vitest.config.ts',
  'packages/export-sequelize/vitest.config.ts',
]);
