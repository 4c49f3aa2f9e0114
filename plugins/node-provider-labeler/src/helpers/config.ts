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

import { Config, readDurationFromConfig } from '@backstage/config';
import { CustomErrorBase, InputError } from '@backstage/errors';
import { HumanDuration } from '@backstage/types';
import {
  CONFIG_ROOT,
  DEFAULT_BACKOFF_INITIAL,
  DEFAULT_BACKOFF_MAX,
  DEFAULT_CONCURRENCY,
  DEFAULT_DEBOUNCE,
  DEFAULT_KEY_NAME,
  DEFAULT_REQUEUE_INTERVAL,
  DEFAULT_SERVER_PORT,
  DEFAULT_TEMPLATE,
} from '../constants';
import { Domain, LabelerConfig, TemplateSource, TemplateSpec } from '../types';
import { validateMetadataKey } from './metadataKey';
import { compileTemplate, TemplateCompileError } from './template';

/**
 * Every problem found in the configured keys and templates.
 */
export class TemplateConfigError extends CustomErrorBase {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `invalid template configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`,
    );
    this.problems = problems;
  }
}

/**
 * Parse the `key[=template]` form used on the command line.
 */
export const parseTemplateFlag = (flag: string, domain: Domain): TemplateSource => {
  const separator = flag.indexOf('=');
  if (separator === -1) {
    return { key: flag, domain };
  }

  return {
    key: flag.slice(0, separator),
    template: flag.slice(separator + 1),
    domain,
  };
};

const readTemplateSources = (
  config: Config | undefined,
  key: string,
  domain: Domain,
): TemplateSource[] =>
  (config?.getOptionalConfigArray(key) ?? []).map(entry => ({
    key: entry.getString('key'),
    template: entry.getOptionalString('template'),
    domain,
  }));

const readOptionalDuration = (
  config: Config | undefined,
  key: string,
): HumanDuration | undefined =>
  config?.has(key) ? readDurationFromConfig(config, { key }) : undefined;

const readPositiveInteger = (
  config: Config | undefined,
  key: string,
  defaultValue: number,
): number => {
  const value = config?.getOptionalNumber(key) ?? defaultValue;
  if (!Number.isInteger(value) || value < 1) {
    throw new InputError(
      `${CONFIG_ROOT}.${key} must be a positive integer, got ${value}`,
    );
  }
  return value;
};

export const readLabelerConfig = (rootConfig: Config): LabelerConfig => {
  const config = rootConfig.getOptionalConfig(CONFIG_ROOT);

  const labels = readTemplateSources(config, 'labels', 'label');
  const annotations = readTemplateSources(config, 'annotations', 'annotation');

  // With nothing configured, fall back to a single default label.
  const templates: TemplateSource[] =
    labels.length === 0 && annotations.length === 0
      ? [{ key: DEFAULT_KEY_NAME, template: DEFAULT_TEMPLATE, domain: 'label' }]
      : [...labels, ...annotations];

  return {
    templates,
    requeueInterval:
      readOptionalDuration(config, 'requeueInterval') ?? DEFAULT_REQUEUE_INTERVAL,
    debounce: readOptionalDuration(config, 'debounce') ?? DEFAULT_DEBOUNCE,
    concurrency: readPositiveInteger(config, 'concurrency', DEFAULT_CONCURRENCY),
    backoff: {
      initial:
        readOptionalDuration(config, 'backoff.initial') ?? DEFAULT_BACKOFF_INITIAL,
      max: readOptionalDuration(config, 'backoff.max') ?? DEFAULT_BACKOFF_MAX,
    },
    serverPort: readPositiveInteger(config, 'server.port', DEFAULT_SERVER_PORT),
  };
};

/**
 * Validate the keys and compile the templates of every configured entry.
 *
 * All problems are collected and thrown together as a TemplateConfigError.
 */
export const compileTemplateSpecs = (sources: TemplateSource[]): TemplateSpec[] => {
  const problems: string[] = [];
  const specs: TemplateSpec[] = [];
  const seen = new Set<string>();

  for (const source of sources) {
    const name = `${source.domain} '${source.key}'`;
    let valid = true;

    const keyProblem = validateMetadataKey(source.key);
    if (keyProblem) {
      problems.push(`${name}: ${keyProblem}`);
      valid = false;
    }

    const seenKey = `${source.domain}:${source.key}`;
    if (seen.has(seenKey)) {
      problems.push(`${name}: configured more than once`);
      valid = false;
    }
    seen.add(seenKey);

    try {
      const template = compileTemplate(
        source.template ?? DEFAULT_TEMPLATE,
        source.domain,
      );
      if (valid) {
        specs.push(
          Object.freeze({ key: source.key, domain: source.domain, template }),
        );
      }
    } catch (error) {
      if (!(error instanceof TemplateCompileError)) {
        throw error;
      }
      problems.push(`${name}: ${error.message}`);
    }
  }

  if (problems.length > 0) {
    throw new TemplateConfigError(problems);
  }

  return specs;
};
