/**
 * Vitest Global Test Setup
 *
 * - Requires a native fetch (the server tests call the app over loopback)
 * - Pins TZ so calendar-date code cannot lean on the host's local zone
 * - Undoes per-test global stubs and spies
 */

import { afterEach, vi } from 'vitest';

// Ensure fetch is available (Node 18+ has native fetch)
if (typeof globalThis.fetch === 'undefined') {
    throw new Error('fetch is not available. Ensure Node 18+ is used.');
}

process.env.TZ = 'Pacific/Kiritimati';

afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
});
