import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    testTimeout: 20_000,
    env: {
      UPLOAD_DIR: path.join(os.tmpdir(), 'keyword-docs-test-uploads'),
      OPENAI_API_KEY: ''
    }
  }
});
