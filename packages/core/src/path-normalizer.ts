/*
 * SPDX-License-Identifier: AGPL-3.0-or-later
 * Copyright (C) 2025 Carbonara team
 */

import path from 'path';

/**
 * Normalizes a path reported by a tool so that it is relative to the working root.
 *
 * Absolute paths, `./` prefixes and `../` segments all collapse to one form, so
 * `/repo/src/a.js`, `./src/a.js` and `src/lib/../a.js` (with root `/repo`) all
 * become `src/a.js`. Pure path algebra: the file does not need to exist.
 */
export function normalizePath(rawPath: string, workingRoot: string): string {
  const absolute = path.resolve(workingRoot, rawPath);
  const relative = path.relative(path.resolve(workingRoot), absolute);
  return relative === '' ? '.' : relative;
}
