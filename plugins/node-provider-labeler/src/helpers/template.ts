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

import { CustomErrorBase } from '@backstage/errors';
import { LABEL_VALUE_MAX_LENGTH } from '../constants';
import {
  CompiledTemplate,
  Domain,
  EvaluationResult,
  ProviderID,
  Segment,
  TokenKind,
} from '../types';

export type TemplateCompileErrorKind = 'UnknownToken' | 'MalformedTemplate';

export class TemplateCompileError extends CustomErrorBase {
  readonly kind: TemplateCompileErrorKind;
  readonly template: string;
  readonly position: number;

  constructor(
    kind: TemplateCompileErrorKind,
    template: string,
    position: number,
    message: string,
  ) {
    super(`${kind}: ${message} in template '${template}'`);
    this.kind = kind;
    this.template = template;
    this.position = position;
  }
}

const LABEL_CHAR = /^[A-Za-z0-9._-]$/;
const LABEL_UNSAFE_CHARS = /[^A-Za-z0-9._-]/g;
const LABEL_VALUE = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/;
const INDEX_TOKEN = /^[0-9]+$/;

const NAMED_TOKENS = new Map<string, TokenKind>([
  [':provider', { type: 'provider' }],
  [':first', { type: 'first' }],
  [':last', { type: 'last' }],
  [':all', { type: 'all' }],
]);

const parseToken = (
  content: string,
  template: string,
  position: number,
): TokenKind => {
  const named = NAMED_TOKENS.get(content);
  if (named) {
    return named;
  }

  if (INDEX_TOKEN.test(content)) {
    return { type: 'index', index: Number.parseInt(content, 10) };
  }

  throw new TemplateCompileError(
    'UnknownToken',
    template,
    position,
    `unknown token '{${content}}' at position ${position}`,
  );
};

/**
 * Compile a template such as `{:provider}-{0}` into literal and token
 * segments.
 *
 * Literal text in a label template is restricted to the characters a label
 * value may contain.
 */
export const compileTemplate = (
  template: string,
  domain: Domain,
): CompiledTemplate => {
  const segments: Segment[] = [];
  let literal = '';
  let position = 0;

  const malformed = (at: number, message: string) =>
    new TemplateCompileError('MalformedTemplate', template, at, message);

  while (position < template.length) {
    const char = template[position];

    if (char === '}') {
      throw malformed(position, `unexpected '}' at position ${position}`);
    }

    if (char !== '{') {
      if (domain === 'label' && !LABEL_CHAR.test(char)) {
        throw malformed(
          position,
          `character '${char}' at position ${position} is not allowed in a label value`,
        );
      }
      literal += char;
      position += 1;
      continue;
    }

    const close = template.indexOf('}', position + 1);
    if (close === -1) {
      throw malformed(position, `unclosed '{' at position ${position}`);
    }
    const nested = template.indexOf('{', position + 1);
    if (nested !== -1 && nested < close) {
      throw malformed(nested, `unexpected '{' at position ${nested}`);
    }

    if (literal) {
      segments.push({ type: 'literal', text: literal });
      literal = '';
    }
    segments.push({
      type: 'token',
      token: parseToken(template.slice(position + 1, close), template, position),
    });
    position = close + 1;
  }

  if (literal) {
    segments.push({ type: 'literal', text: literal });
  }

  return { source: template, domain, segments };
};

const describeToken = (token: TokenKind): string =>
  token.type === 'index' ? `{${token.index}}` : `{:${token.type}}`;

const resolveToken = (
  token: TokenKind,
  providerID: ProviderID,
  domain: Domain,
): string | undefined => {
  const { segments } = providerID;

  switch (token.type) {
    case 'provider':
      return providerID.provider;
    case 'first':
      return segments[0];
    case 'last':
      return segments[segments.length - 1];
    case 'index':
      return segments[token.index];
    case 'all':
      // '/' is not allowed in a label value
      return segments.join(domain === 'label' ? '_' : '/');
    default:
      return undefined;
  }
};

export const isValidLabelValue = (value: string): boolean =>
  value.length <= LABEL_VALUE_MAX_LENGTH && LABEL_VALUE.test(value);

/**
 * Render a compiled template for a provider ID.
 *
 * In the label domain, characters a token produces that cannot appear in a
 * label value are replaced with `_`, and a result that is still not a valid
 * label value fails rather than being truncated.
 */
export const evaluateTemplate = (
  template: CompiledTemplate,
  providerID: ProviderID | undefined,
  domain: Domain,
): EvaluationResult => {
  if (!providerID) {
    return {
      ok: false,
      reason: 'MissingProviderID',
      message: 'node has no provider ID',
    };
  }

  let value = '';
  for (const segment of template.segments) {
    if (segment.type === 'literal') {
      value += segment.text;
      continue;
    }

    const resolved = resolveToken(segment.token, providerID, domain);
    if (resolved === undefined) {
      return {
        ok: false,
        reason: 'IndexOutOfRange',
        message: `${describeToken(segment.token)} is out of range for provider ID '${providerID.raw}' with ${providerID.segments.length} segments`,
      };
    }

    value +=
      domain === 'label' ? resolved.replace(LABEL_UNSAFE_CHARS, '_') : resolved;
  }

  if (domain === 'label' && !isValidLabelValue(value)) {
    return {
      ok: false,
      reason: 'InvalidLabelValue',
      message: `'${value}' is not a valid label value`,
    };
  }

  return { ok: true, value };
};
