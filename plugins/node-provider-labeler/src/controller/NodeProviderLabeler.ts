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

import { Config } from '@backstage/config';
import { stringifyError } from '@backstage/errors';
import { durationToMilliseconds } from '@backstage/types';
import pLimit from 'p-limit';
import * as uuid from 'uuid';
import { Logger } from 'winston';
import { backoffDelay, DEFAULT_BACKOFF_OPTIONS } from '../helpers/backoff';
import { compileTemplateSpecs, readLabelerConfig } from '../helpers/config';
import { Diagnostics } from '../helpers/diagnostics';
import {
  desiredPairs,
  diffMetadata,
  isEmptyPatch,
  resolveTemplates,
} from '../helpers/planner';
import { parseProviderID } from '../helpers/providerId';
import {
  ApplyResult,
  BackoffOptions,
  LabelerConfig,
  NodeEvent,
  NodeSnapshot,
  NodeStore,
  ReconcileOutcome,
  ReconcileTarget,
  TemplateSpec,
} from '../types';

type NodeState = {
  // Latest snapshot from a watch event, consumed by the next cycle.
  snapshot?: NodeSnapshot;
  timer?: NodeJS.Timeout;
  nextReconcileAt?: number;
  // An event arrived while a cycle for the node was in flight.
  dirty: boolean;
  failures: number;
};

export type NodeProviderLabelerOptions = {
  logger: Logger;
  store: NodeStore;
  diagnostics?: Diagnostics;
  now?: () => number;
  random?: () => number;
};

/**
 * Keeps the configured labels and annotations of every Node in line with
 * its provider ID.
 *
 * Each node has its own timer. Watch events are debounced, failures are
 * retried with jittered exponential backoff, and successful cycles are
 * repeated after the requeue interval. At most one cycle runs per node, and
 * a bounded number run across all nodes.
 *
 * Use `NodeProviderLabeler.fromConfig(...)` to create instances.
 */
export class NodeProviderLabeler {
  private readonly specs: TemplateSpec[];
  private readonly store: NodeStore;
  private readonly logger: Logger;
  private readonly diagnostics: Diagnostics;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly requeueMs: number;
  private readonly debounceMs: number;
  private readonly backoff: BackoffOptions;
  private readonly limit: pLimit.Limit;
  private readonly nodes = new Map<string, NodeState>();
  // Keyed by name so a cycle outlives a delete and re-add of its node.
  private readonly inFlight = new Set<string>();
  private running = false;

  /**
   * Throws a TemplateConfigError listing every invalid key and template, so
   * a bad configuration stops the process before any node is watched.
   */
  static fromConfig(
    rootConfig: Config,
    options: NodeProviderLabelerOptions,
  ): NodeProviderLabeler {
    const config = readLabelerConfig(rootConfig);
    const specs = compileTemplateSpecs(config.templates);

    return new NodeProviderLabeler(specs, config, options);
  }

  protected constructor(
    specs: TemplateSpec[],
    config: LabelerConfig,
    options: NodeProviderLabelerOptions,
  ) {
    this.specs = specs;
    this.store = options.store;
    this.logger = options.logger;
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.now = options.now ?? (() => Date.now());
    this.random = options.random ?? Math.random;
    this.requeueMs = durationToMilliseconds(config.requeueInterval);
    this.debounceMs = durationToMilliseconds(config.debounce);
    this.backoff = {
      ...DEFAULT_BACKOFF_OPTIONS,
      initialMs: durationToMilliseconds(config.backoff.initial),
      maxMs: durationToMilliseconds(config.backoff.max),
    };
    this.limit = pLimit(config.concurrency);
  }

  async start(): Promise<void> {
    this.running = true;
    this.logger.info(
      `Starting node provider labeler with ${this.specs.length} configured keys`,
    );

    await this.store.start(event => this.handleEvent(event));
    this.diagnostics.markReady();
    this.logger.info(`Initial node list received, tracking ${this.nodes.size} nodes`);
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const state of this.nodes.values()) {
      clearTimeout(state.timer);
    }
    this.nodes.clear();

    await this.store.stop();
  }

  trackedNodes(): string[] {
    return [...this.nodes.keys()].sort();
  }

  /** When the next cycle for a node is due, in epoch milliseconds. */
  nextReconcileAt(nodeName: string): number | undefined {
    return this.nodes.get(nodeName)?.nextReconcileAt;
  }

  /**
   * Run one cycle for a node: evaluate the templates, and patch the keys
   * whose values differ.
   */
  async reconcileNode(
    snapshot: NodeSnapshot,
    logger: Logger = this.logger.child({ node: snapshot.name }),
  ): Promise<ReconcileOutcome> {
    const providerID = parseProviderID(snapshot.providerID);
    if (!providerID) {
      logger.debug('Node has no provider ID, skipping');
      return 'skipped';
    }

    const resolved = resolveTemplates(this.specs, providerID);
    for (const { key, domain, result } of resolved) {
      if (!result.ok) {
        logger.warn(`Not setting ${domain} ${key}: ${result.message}`);
      }
    }

    const target: ReconcileTarget = {
      nodeName: snapshot.name,
      providerID,
      labels: desiredPairs(resolved, 'label'),
      annotations: desiredPairs(resolved, 'annotation'),
      nextReconcileAt: this.now() + this.requeueMs,
    };
    logger.debug('Desired node metadata', { target });

    const patch = diffMetadata(target, snapshot);
    if (isEmptyPatch(patch)) {
      logger.debug('Node metadata is up to date');
      return 'scheduled';
    }

    let result: ApplyResult;
    try {
      result = await this.store.applyPatch(snapshot.name, patch, {
        resourceVersion: snapshot.resourceVersion,
      });
    } catch (error) {
      logger.warn(`Failed to patch node: ${stringifyError(error)}`);
      return 'failed';
    }

    switch (result) {
      case 'applied':
        logger.info('Updated node metadata', {
          labels: Object.keys(patch.labels),
          annotations: Object.keys(patch.annotations),
        });
        return 'scheduled';
      case 'conflict':
        logger.info('Node changed while patching, will retry');
        return 'failed';
      case 'notFound':
        logger.info('Node no longer exists');
        return 'discarded';
    }
  }

  private handleEvent(event: NodeEvent) {
    if (!this.running) {
      return;
    }
    this.diagnostics.recordEvent();

    if (event.type === 'delete') {
      this.logger.debug(`Node ${event.nodeName} deleted`);
      this.forget(event.nodeName);
      return;
    }

    const name = event.node.name;
    const state = this.nodes.get(name) ?? { dirty: false, failures: 0 };
    this.nodes.set(name, state);
    state.snapshot = event.node;
    state.failures = 0;

    if (this.inFlight.has(name)) {
      clearTimeout(state.timer);
      state.timer = undefined;
      state.dirty = true;
      return;
    }

    this.arm(name, state, this.debounceMs);
  }

  private forget(name: string) {
    const state = this.nodes.get(name);
    if (state) {
      clearTimeout(state.timer);
      this.nodes.delete(name);
    }
  }

  private arm(name: string, state: NodeState, delayMs: number) {
    clearTimeout(state.timer);
    state.nextReconcileAt = this.now() + delayMs;
    state.timer = setTimeout(() => {
      state.timer = undefined;
      this.enqueue(name, state);
    }, delayMs);
  }

  private enqueue(name: string, state: NodeState) {
    if (this.nodes.get(name) !== state || this.inFlight.has(name)) {
      return;
    }

    this.inFlight.add(name);
    state.dirty = false;
    this.limit(() => this.runCycle(name, state)).catch(error =>
      this.logger.error(`Reconcile of node ${name} failed: ${stringifyError(error)}`),
    );
  }

  private async runCycle(name: string, state: NodeState) {
    let outcome: ReconcileOutcome;
    try {
      outcome = await this.reconcile(name, state);
    } catch (error) {
      this.logger.warn(`Reconcile of node ${name} failed: ${stringifyError(error)}`);
      outcome = 'failed';
    } finally {
      this.inFlight.delete(name);
    }

    const current = this.nodes.get(name);
    if (!this.running || !current) {
      return;
    }

    // Also covers a node deleted and added again during the cycle.
    if (current.dirty) {
      current.dirty = false;
      this.arm(name, current, this.debounceMs);
      return;
    }
    if (current !== state) {
      return;
    }

    switch (outcome) {
      case 'scheduled':
      case 'skipped':
        state.failures = 0;
        this.arm(name, state, this.requeueMs);
        break;
      case 'failed':
        state.failures += 1;
        this.arm(name, state, backoffDelay(state.failures, this.backoff, this.random));
        break;
      case 'discarded':
        this.forget(name);
        break;
    }
  }

  private async reconcile(name: string, state: NodeState): Promise<ReconcileOutcome> {
    // Stopped, or the node was deleted while the cycle waited for a slot.
    if (!this.running || this.nodes.get(name) !== state) {
      return 'discarded';
    }

    const logger = this.logger.child({ node: name, reconcileId: uuid.v4() });

    let snapshot = state.snapshot;
    state.snapshot = undefined;

    if (!snapshot) {
      try {
        snapshot = await this.store.getNode(name);
      } catch (error) {
        logger.warn(`Failed to read node: ${stringifyError(error)}`);
        return 'failed';
      }
      if (!snapshot) {
        logger.info('Node no longer exists');
        return 'discarded';
      }
    }

    return this.reconcileNode(snapshot, logger);
  }
}
