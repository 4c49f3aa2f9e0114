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

// Used when neither labels nor annotations are configured.
export const DEFAULT_KEY_NAME = 'provider-id';
// Used when a key is configured without a template.
export const DEFAULT_TEMPLATE = '{:last}';

// Field manager recorded on the Node patches this controller makes.
export const FIELD_MANAGER = 'node-provider-labeler';

// Config root for the controller.
export const CONFIG_ROOT = 'nodeProviderLabeler';

export const DEFAULT_REQUEUE_INTERVAL = { hours: 1 };
export const DEFAULT_DEBOUNCE = { milliseconds: 500 };
export const DEFAULT_CONCURRENCY = 2;
export const DEFAULT_BACKOFF_INITIAL = { seconds: 1 };
export const DEFAULT_BACKOFF_MAX = { minutes: 1 };
export const DEFAULT_SERVER_PORT = 8080;

// How long a watch error keeps the health check failing.
export const WATCH_ERROR_WINDOW_MS = 60_000;
// Delay before the node informer is restarted after a watch error.
export const WATCH_RESTART_DELAY_MS = 5_000;

export const LABEL_VALUE_MAX_LENGTH = 63;
export const METADATA_NAME_MAX_LENGTH = 63;
export const METADATA_PREFIX_MAX_LENGTH = 253;
