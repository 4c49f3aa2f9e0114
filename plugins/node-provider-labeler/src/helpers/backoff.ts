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

import { BackoffOptions } from '../types';

export const DEFAULT_BACKOFF_OPTIONS: BackoffOptions = {
  initialMs: 1_000,
  maxMs: 60_000,
  factor: 2,
  jitterFactor: 0.2,
};

/**
 * Delay before retry number `attempt` (starting at 1): exponential growth
 * capped at `maxMs`, spread by up to `jitterFactor` either way.
 */
export const backoffDelay = (
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF_OPTIONS,
  random: () => number = Math.random,
): number => {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(options.initialMs * options.factor ** exponent, options.maxMs);
  const jitter = base * options.jitterFactor * (random() * 2 - 1);

  return Math.round(Math.min(options.maxMs, Math.max(options.initialMs, base + jitter)));
};
