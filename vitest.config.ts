import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts'],
    env: {
      SESSIONS_DIR: path.join(os.tmpdir(), 'cue-editor-test-sessions'),
      NODE_ENV: 'test',
    },
  },
});
