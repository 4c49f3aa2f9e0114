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
import { KubeConfig, V1Node } from '@kubernetes/client-node';
import { Logger } from 'winston';
import { CONFIG_ROOT, FIELD_MANAGER } from '../constants';
import { ApplyPrecondition, MetadataPatch, NodeSnapshot } from '../types';

/**
 * Get a KubeConfig for the cluster whose nodes are labelled.
 *
 * Uses the `nodeProviderLabeler.kubernetes` section when it carries a
 * service account token, otherwise the default loading rules (KUBECONFIG,
 * ~/.kube/config or the in-cluster service account).
 */
export const getKubeConfig = (rootConfig: Config, logger: Logger): KubeConfig => {
  const config = rootConfig.getOptionalConfig(`${CONFIG_ROOT}.kubernetes`);
  const token = config?.getOptionalString('serviceAccountToken');
  const kubeConfig = new KubeConfig();

  if (!config || !token) {
    logger.info('Loading kubernetes config from the default locations');
    kubeConfig.loadFromDefault();
    return kubeConfig;
  }

  const name = config.getOptionalString('name') ?? 'default';
  logger.info(`Connecting to cluster ${name} with a service account token`);
  kubeConfig.loadFromOptions({
    clusters: [
      {
        name,
        server: config.getString('url'),
        skipTLSVerify: config.getOptionalBoolean('skipTLSVerify') ?? false,
        caData: config.getOptionalString('caData'),
      },
    ],
    users: [{ name: FIELD_MANAGER, token }],
    contexts: [{ name, cluster: name, user: FIELD_MANAGER }],
    currentContext: name,
  });

  return kubeConfig;
};

export const nodeSnapshot = (node: V1Node): NodeSnapshot | undefined => {
  const name = node.metadata?.name;
  if (!name) {
    return undefined;
  }

  return {
    name,
    providerID: node.spec?.providerID ?? '',
    labels: { ...node.metadata?.labels },
    annotations: { ...node.metadata?.annotations },
    resourceVersion: node.metadata?.resourceVersion,
  };
};

/**
 * JSON merge patch body for a metadata patch. The resourceVersion makes the
 * API server reject the patch with a conflict if the node changed since it
 * was read.
 */
export const nodePatchBody = (
  patch: MetadataPatch,
  precondition: ApplyPrecondition,
) => {
  const metadata: {
    resourceVersion?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  } = {};

  if (precondition.resourceVersion) {
    metadata.resourceVersion = precondition.resourceVersion;
  }
  if (Object.keys(patch.labels).length > 0) {
    metadata.labels = patch.labels;
  }
  if (Object.keys(patch.annotations).length > 0) {
    metadata.annotations = patch.annotations;
  }

  return { metadata };
};
