/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { fileURLToPath } from 'node:url';

// Resolves to <repo>/proto from both src/sources and dist/sources
export const PROTO_DIR = fileURLToPath(new URL('../../proto', import.meta.url));
