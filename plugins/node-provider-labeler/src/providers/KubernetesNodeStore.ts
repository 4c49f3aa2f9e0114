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
  ADD,
  CoreV1Api,
  DELETE,
  ERROR,
  HttpError,
  Informer,
  KubeConfig,
  makeInformer,
  PatchUtils,
  UPDATE,
  V1Node,
} from '@kubernetes/client-node';
import { stringifyError } from '@backstage/errors';
import { Logger } from 'winston';
import { FIELD_MANAGER, WATCH_RESTART_DELAY_MS } from '../constants';
import { nodePatchBody, nodeSnapshot } from '../helpers/kubernetes';
import {
  ApplyPrecondition,
  ApplyResult,
  MetadataPatch,
  NodeEvent,
  NodeSnapshot,
  NodeStore,
} from '../types';

export type NodeInformer = Pick<Informer<V1Node>, 'on' | 'start' | 'stop'>;

type StoreOptions = {
  logger: Logger;
  onWatchError?: (error: unknown) => void;
  restartDelayMs?: number;
};

const isStatus = (error: unknown, statusCode: number) =>
  error instanceof HttpError && error.statusCode === statusCode;

/**
 * NodeStore backed by the Kubernetes API: an informer over /api/v1/nodes for
 * events, and merge patches for metadata changes.
 *
 * Use `KubernetesNodeStore.fromKubeConfig(...)` to create instances.
 */
export class KubernetesNodeStore implements NodeStore {
  private readonly api: CoreV1Api;
  private readonly informer: NodeInformer;
  private readonly logger: Logger;
  private readonly onWatchError: (error: unknown) => void;
  private readonly restartDelayMs: number;
  private restartTimer?: NodeJS.Timeout;
  private stopped = false;

  static fromKubeConfig(
    kubeConfig: KubeConfig,
    options: StoreOptions,
  ): KubernetesNodeStore {
    const api = kubeConfig.makeApiClient(CoreV1Api);
    const informer = makeInformer<V1Node>(kubeConfig, '/api/v1/nodes', () =>
      api.listNode(),
    );

    return new KubernetesNodeStore(api, informer, options);
  }

  constructor(api: CoreV1Api, informer: NodeInformer, options: StoreOptions) {
    this.api = api;
    this.informer = informer;
    this.logger = options.logger;
    this.onWatchError = options.onWatchError ?? (() => undefined);
    this.restartDelayMs = options.restartDelayMs ?? WATCH_RESTART_DELAY_MS;
  }

  async start(handler: (event: NodeEvent) => void): Promise<void> {
    const upsert = (node: V1Node) => {
      const snapshot = nodeSnapshot(node);
      if (snapshot) {
        handler({ type: 'upsert', node: snapshot });
      }
    };

    this.informer.on(ADD, upsert);
    this.informer.on(UPDATE, upsert);
    this.informer.on(DELETE, (node: V1Node) => {
      const nodeName = node.metadata?.name;
      if (nodeName) {
        handler({ type: 'delete', nodeName });
      }
    });
    this.informer.on(ERROR, (error: unknown) => this.handleWatchError(error));

    this.stopped = false;
    this.logger.info('Starting node watch');
    await this.informer.start();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    clearTimeout(this.restartTimer);
    await this.informer.stop();
  }

  async getNode(name: string): Promise<NodeSnapshot | undefined> {
    try {
      const { body } = await this.api.readNode(name);
      return nodeSnapshot(body);
    } catch (error) {
      if (isStatus(error, 404)) {
        return undefined;
      }
      throw error;
    }
  }

  async applyPatch(
    name: string,
    patch: MetadataPatch,
    precondition: ApplyPrecondition,
  ): Promise<ApplyResult> {
    try {
      await this.api.patchNode(
        name,
        nodePatchBody(patch, precondition),
        undefined,
        undefined,
        FIELD_MANAGER,
        undefined,
        undefined,
        { headers: { 'Content-Type': PatchUtils.PATCH_FORMAT_JSON_MERGE_PATCH } },
      );
      return 'applied';
    } catch (error) {
      if (isStatus(error, 409)) {
        return 'conflict';
      }
      if (isStatus(error, 404)) {
        return 'notFound';
      }
      throw error;
    }
  }

  private handleWatchError(error: unknown) {
    this.logger.error(`Node watch failed: ${stringifyError(error)}`);
    this.onWatchError(error);

    if (this.stopped) {
      return;
    }

    clearTimeout(this.restartTimer);
    this.restartTimer = setTimeout(() => {
      this.logger.info('Restarting node watch');
      this.informer.start().catch(err => this.handleWatchError(err));
    }, this.restartDelayMs);
  }
}
