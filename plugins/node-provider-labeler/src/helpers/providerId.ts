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

import { ProviderID } from '../types';

const SCHEME_SEPARATOR = '://';

/**
 * Parse a node's `spec.providerID` in the `<provider>://<segment>/...` form.
 *
 * Returns undefined for an empty or malformed ID, which callers treat as
 * "nothing to compute this cycle" rather than an error.
 */
export const parseProviderID = (raw: string): ProviderID | undefined => {
  if (!raw) {
    return undefined;
  }

  const separator = raw.indexOf(SCHEME_SEPARATOR);
  if (separator < 1) {
    return undefined;
  }

  const provider = raw.slice(0, separator);
  const path = raw.slice(separator + SCHEME_SEPARATOR.length);

  return {
    raw,
    provider,
    segments: path === '' ? [] : path.split('/'),
  };
};
