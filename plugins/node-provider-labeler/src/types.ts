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

import { HumanDuration } from '@backstage/types';

/** Target metadata kind of a configured key. */
export type Domain = 'label' | 'annotation';

/**
 * A node's `spec.providerID` split into its provider name and the
 * provider specific segments, e.g. `aws://us-west-2/i-0abc` is
 * `{ provider: 'aws', segments: ['us-west-2', 'i-0abc'] }`.
 */
export type ProviderID = {
  raw: string;
  provider: string;
  segments: string[];
};

export type TokenKind =
  | { type: 'index'; index: number }
  | { type: 'provider' }
  | { type: 'first' }
  | { type: 'last' }
  | { type: 'all' };

export type Segment =
  | { type: 'literal'; text: string }
  | { type: 'token'; token: TokenKind };

export type CompiledTemplate = {
  source: string;
  domain: Domain;
  segments: Segment[];
};

export type TemplateSpec = {
  key: string;
  domain: Domain;
  template: CompiledTemplate;
};

/** A key and template as read from configuration, before validation. */
export type TemplateSource = {
  key: string;
  template?: string;
  domain: Domain;
};

export type EvaluationFailure =
  | 'MissingProviderID'
  | 'IndexOutOfRange'
  | 'InvalidLabelValue';

export type EvaluationResult =
  | { ok: true; value: string }
  | { ok: false; reason: EvaluationFailure; message: string };

export type ResolvedValue = {
  key: string;
  domain: Domain;
  result: EvaluationResult;
};

export type MetadataPairs = Record<string, string>;

export type NodeMetadata = {
  labels: MetadataPairs;
  annotations: MetadataPairs;
};

export type MetadataPatch = NodeMetadata;

/** A point in time view of a Node as held by the store. */
export type NodeSnapshot = NodeMetadata & {
  name: string;
  providerID: string;
  resourceVersion?: string;
};

export type NodeEvent =
  | { type: 'upsert'; node: NodeSnapshot }
  | { type: 'delete'; nodeName: string };

export type ApplyResult = 'applied' | 'conflict' | 'notFound';

export type ApplyPrecondition = {
  resourceVersion?: string;
};

/**
 * Source of Node snapshots and sink for metadata patches.
 */
export interface NodeStore {
  /**
   * Subscribe to node changes. Resolves once the initial set of nodes has
   * been delivered to the handler.
   */
  start(handler: (event: NodeEvent) => void): Promise<void>;
  stop(): Promise<void>;
  getNode(name: string): Promise<NodeSnapshot | undefined>;
  /**
   * Apply a patch touching only the keys in the patch. Rejects on errors
   * other than a conflict or a missing node.
   */
  applyPatch(
    name: string,
    patch: MetadataPatch,
    precondition: ApplyPrecondition,
  ): Promise<ApplyResult>;
}

export type ReconcileOutcome = 'scheduled' | 'skipped' | 'failed' | 'discarded';

/** Desired state for one node for one reconcile cycle. */
export type ReconcileTarget = {
  nodeName: string;
  providerID?: ProviderID;
  labels: MetadataPairs;
  annotations: MetadataPairs;
  nextReconcileAt?: number;
};

export type BackoffOptions = {
  initialMs: number;
  maxMs: number;
  factor: number;
  jitterFactor: number;
};

export type LabelerConfig = {
  templates: TemplateSource[];
  requeueInterval: HumanDuration;
  debounce: HumanDuration;
  concurrency: number;
  backoff: {
    initial: HumanDuration;
    max: HumanDuration;
  };
  serverPort: number;
};
