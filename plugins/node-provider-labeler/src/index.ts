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

export { NodeProviderLabeler } from './controller/NodeProviderLabeler';
export type { NodeProviderLabelerOptions } from './controller/NodeProviderLabeler';
export { KubernetesNodeStore } from './providers/KubernetesNodeStore';
export { createRouter } from './router/router';
export type { RouterOptions } from './router/router';
export { Diagnostics } from './helpers/diagnostics';
export { parseProviderID } from './helpers/providerId';
export {
  compileTemplate,
  evaluateTemplate,
  TemplateCompileError,
} from './helpers/template';
export { planMetadataPatch, resolveTemplates } from './helpers/planner';
export { validateMetadataKey } from './helpers/metadataKey';
export {
  compileTemplateSpecs,
  readLabelerConfig,
  TemplateConfigError,
} from './helpers/config';
export { getKubeConfig } from './helpers/kubernetes';
export * from './types';
