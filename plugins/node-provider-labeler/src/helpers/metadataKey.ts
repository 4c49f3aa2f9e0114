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

import {
  METADATA_NAME_MAX_LENGTH,
  METADATA_PREFIX_MAX_LENGTH,
} from '../constants';

const NAME_CHARS = /^[A-Za-z0-9._-]*$/;
const DNS_LABEL_CHARS = /^[A-Za-z0-9_-]*$/;
const ALPHANUMERIC = /^[A-Za-z0-9]$/;

const startsAndEndsAlphanumeric = (s: string) =>
  ALPHANUMERIC.test(s.charAt(0)) && ALPHANUMERIC.test(s.charAt(s.length - 1));

const invalidCharacter = (s: string, allowed: RegExp): string | undefined =>
  [...s].find(c => !allowed.test(c));

const validateName = (name: string): string | undefined => {
  if (name.length > METADATA_NAME_MAX_LENGTH) {
    return `invalid name (> ${METADATA_NAME_MAX_LENGTH} characters)`;
  }
  if (!startsAndEndsAlphanumeric(name)) {
    return 'invalid name (must start and end with an alphanumeric character)';
  }
  const invalid = invalidCharacter(name, NAME_CHARS);
  if (invalid !== undefined) {
    return `invalid name (invalid character '${invalid}')`;
  }
  return undefined;
};

// The prefix is a DNS subdomain.
const validatePrefix = (prefix: string): string | undefined => {
  if (prefix.length > METADATA_PREFIX_MAX_LENGTH) {
    return `invalid prefix (> ${METADATA_PREFIX_MAX_LENGTH} characters)`;
  }

  for (const label of prefix.split('.')) {
    if (label.length < 1) {
      return 'invalid prefix (dns label < 1 character)';
    }
    if (label.length > METADATA_NAME_MAX_LENGTH) {
      return `invalid prefix (dns label > ${METADATA_NAME_MAX_LENGTH} characters)`;
    }
    const invalid = invalidCharacter(label, DNS_LABEL_CHARS);
    if (invalid !== undefined) {
      return `invalid prefix (invalid character '${invalid}')`;
    }
    if (!startsAndEndsAlphanumeric(label)) {
      return 'invalid prefix (must start and end with an alphanumeric character)';
    }
  }
  return undefined;
};

/**
 * Check a label or annotation key of the form `[prefix/]name`.
 *
 * @returns a description of the problem, or undefined for a valid key
 */
export const validateMetadataKey = (key: string): string | undefined => {
  const parts = key.split('/');

  if (parts.length === 1) {
    return validateName(parts[0]);
  }
  if (parts.length === 2) {
    return validatePrefix(parts[0]) ?? validateName(parts[1]);
  }
  return 'invalid key';
};
