import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/eventbus',
  'packages/agent-runtime',
  'packages/orchestrator',
  'packages/display',
  'apps/cli',
]);
