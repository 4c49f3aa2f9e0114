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

import { JsonObject, JsonValue } from '@backstage/types';
import { InvalidArgumentError, Option, Command } from 'commander';
import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import { CONFIG_ROOT } from '../constants';
import { TemplateSource } from '../types';
import { parseTemplateFlag } from './config';

export type CliOptions = {
  config?: string;
  label: string[];
  annotation: string[];
  requeueDuration?: number;
  port?: number;
  logLevel: string;
};

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

const collect = (value: string, previous: string[]) => [...previous, value];

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
};

export const buildProgram = (): Command =>
  new Command()
    .name('node-provider-labeler')
    .description(
      'Set Node labels and annotations derived from spec.providerID',
    )
    .option('-c, --config <file>', 'YAML configuration file')
    .option(
      '-l, --label <key[=template]>',
      'label to set, may be repeated (template defaults to {:last})',
      collect,
      [],
    )
    .option(
      '-a, --annotation <key[=template]>',
      'annotation to set, may be repeated (template defaults to {:last})',
      collect,
      [],
    )
    .option(
      '--requeue-duration <seconds>',
      'interval between periodic reconciles of a node',
      parsePositiveInteger,
    )
    .option('--port <port>', 'port of the health endpoint', parsePositiveInteger)
    .addOption(
      new Option('--log-level <level>', 'log level')
        .choices(LOG_LEVELS)
        .default('info')
        .env('LOG_LEVEL'),
    );

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Read a YAML configuration file. An empty file is an empty configuration.
 */
export const loadConfigFile = async (path: string): Promise<JsonObject> => {
  const content = await fs.readFile(path, 'utf8');
  const data: JsonValue | undefined = parseYaml(content) ?? undefined;

  if (data === undefined) {
    return {};
  }
  if (!isJsonObject(data)) {
    throw new Error(`Configuration file ${path} must contain a mapping`);
  }
  return data;
};

const templateEntry = ({ key, template }: TemplateSource): JsonObject =>
  template === undefined ? { key } : { key, template };

/**
 * Apply command line flags on top of the configuration file. A flag replaces
 * the file's value for the same setting.
 */
export const applyCliOverrides = (
  data: JsonObject,
  options: CliOptions,
): JsonObject => {
  const current = data[CONFIG_ROOT];
  const root: JsonObject = isJsonObject(current) ? { ...current } : {};

  if (options.label.length > 0) {
    root.labels = options.label.map(flag =>
      templateEntry(parseTemplateFlag(flag, 'label')),
    );
  }
  if (options.annotation.length > 0) {
    root.annotations = options.annotation.map(flag =>
      templateEntry(parseTemplateFlag(flag, 'annotation')),
    );
  }
  if (options.requeueDuration !== undefined) {
    root.requeueInterval = { seconds: options.requeueDuration };
  }
  if (options.port !== undefined) {
    const server = root.server;
    root.server = {
      ...(isJsonObject(server) ? server : {}),
      port: options.port,
    };
  }

  return { ...data, [CONFIG_ROOT]: root };
};
