/*
 * Copyright 2023 Kevin McDermott
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { WATCH_ERROR_WINDOW_MS } from '../constants';

export type DiagnosticsStatus = {
  ready: boolean;
  lastEvent?: string;
  recentErrors: number;
};

/**
 * Process level health: whether the node watch is established, when the
 * last node event arrived, and how many watch errors happened recently.
 *
 * Per-node reconcile failures are not recorded here.
 */
export class Diagnostics {
  private readonly now: () => number;
  private readonly errorWindowMs: number;
  private ready = false;
  private lastEvent?: number;
  private errors: number[] = [];

  constructor(options?: { now?: () => number; errorWindowMs?: number }) {
    this.now = options?.now ?? Date.now;
    this.errorWindowMs = options?.errorWindowMs ?? WATCH_ERROR_WINDOW_MS;
  }

  markReady(): void {
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  recordEvent(): void {
    this.lastEvent = this.now();
  }

  recordError(): void {
    this.errors.push(this.now());
  }

  recentErrorCount(): number {
    const cutoff = this.now() - this.errorWindowMs;
    this.errors = this.errors.filter(at => at > cutoff);
    return this.errors.length;
  }

  status(): DiagnosticsStatus {
    return {
      ready: this.ready,
      lastEvent:
        this.lastEvent === undefined
          ? undefined
          : new Date(this.lastEvent).toISOString(),
      recentErrors: this.recentErrorCount(),
    };
  }
}
