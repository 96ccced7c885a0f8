// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { randomBytes } from "node:crypto";

/**
 * Random 32-bit unsigned transaction id from the CSPRNG.
 *
 * No uniqueness is tracked: two in-flight requests of the same message type
 * must not share an id within the async window, or their answers may cross.
 */
export function randomTransactionID(): number {
  return randomBytes(4).readUInt32LE(0);
}
