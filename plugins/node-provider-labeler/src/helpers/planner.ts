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

import { evaluateTemplate } from './template';
import {
  Domain,
  MetadataPairs,
  MetadataPatch,
  NodeMetadata,
  ProviderID,
  ResolvedValue,
  TemplateSpec,
} from '../types';

export const resolveTemplates = (
  specs: TemplateSpec[],
  providerID: ProviderID | undefined,
): ResolvedValue[] =>
  specs.map(spec => ({
    key: spec.key,
    domain: spec.domain,
    result: evaluateTemplate(spec.template, providerID, spec.domain),
  }));

/** The successfully resolved values for a domain, in key order. */
export const desiredPairs = (
  resolved: ResolvedValue[],
  domain: Domain,
): MetadataPairs => {
  const pairs = resolved
    .flatMap(({ key, domain: valueDomain, result }) =>
      valueDomain === domain && result.ok ? [{ key, value: result.value }] : [],
    )
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  const desired: MetadataPairs = {};
  for (const { key, value } of pairs) {
    desired[key] = value;
  }
  return desired;
};

const changedPairs = (
  desired: MetadataPairs,
  current: MetadataPairs,
): MetadataPairs => {
  const changed: MetadataPairs = {};
  for (const [key, value] of Object.entries(desired)) {
    if (!Object.hasOwn(current, key) || current[key] !== value) {
      changed[key] = value;
    }
  }
  return changed;
};

/**
 * The smallest patch that brings a node's metadata in line with the desired
 * pairs. Keys missing from the desired pairs are left alone; the patch never
 * removes metadata.
 */
export const diffMetadata = (
  desired: NodeMetadata,
  current: NodeMetadata,
): MetadataPatch => ({
  labels: changedPairs(desired.labels, current.labels),
  annotations: changedPairs(desired.annotations, current.annotations),
});

/** Keys whose evaluation failed are not part of the patch. */
export const planMetadataPatch = (
  resolved: ResolvedValue[],
  current: NodeMetadata,
): MetadataPatch =>
  diffMetadata(
    {
      labels: desiredPairs(resolved, 'label'),
      annotations: desiredPairs(resolved, 'annotation'),
    },
    current,
  );

export const isEmptyPatch = (patch: MetadataPatch): boolean =>
  Object.keys(patch.labels).length === 0 &&
  Object.keys(patch.annotations).length === 0;
