/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packages = ['data', 'geometry', 'parser', 'spatial', 'dif', 'converter', 'cli'];

export default defineConfig({
  resolve: {
    alias: packages.map((name) => ({
      find: `@csxdif/${name}`,
      replacement: fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
    })),
  },
  test: {
    environment: 'node',
    // Conversions start worker threads that load TypeScript through tsx
    testTimeout: 30_000,
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
  },
});
