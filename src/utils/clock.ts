/**
 * Monotonic wall clock in milliseconds.
 *
 * `performance.now()` never goes backwards; anchoring it at `timeOrigin`
 * keeps values comparable with epoch timestamps from the browser.
 */

import { performance } from 'node:perf_hooks';
import type { ClockFn } from '../types/telemetry.js';

export const monotonicNow: ClockFn = () => performance.timeOrigin + performance.now();
