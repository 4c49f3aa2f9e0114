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

import { ConfigReader } from '@backstage/config';
import { stringifyError } from '@backstage/errors';
import express from 'express';
import { createLogger, format, Logger, transports } from 'winston';
import { NodeProviderLabeler } from './controller/NodeProviderLabeler';
import { applyCliOverrides, buildProgram, CliOptions, loadConfigFile } from './helpers/cli';
import { readLabelerConfig, TemplateConfigError } from './helpers/config';
import { Diagnostics } from './helpers/diagnostics';
import { getKubeConfig } from './helpers/kubernetes';
import { KubernetesNodeStore } from './providers/KubernetesNodeStore';
import { createRouter } from './router/router';

const createRootLogger = (level: string): Logger =>
  createLogger({
    level,
    format: format.combine(format.timestamp(), format.json()),
    transports: [new transports.Console()],
  });

const logStartupError = (logger: Logger, error: unknown) => {
  if (error instanceof TemplateConfigError) {
    for (const problem of error.problems) {
      logger.error(`Invalid template configuration: ${problem}`);
    }
    return;
  }
  logger.error(`Startup failed: ${stringifyError(error)}`);
};

export async function main(argv: string[]): Promise<void> {
  const options = buildProgram().parse(argv).opts<CliOptions>();
  const logger = createRootLogger(options.logLevel);

  let labeler: NodeProviderLabeler;
  let port: number;
  const diagnostics = new Diagnostics();

  try {
    const fileData = options.config ? await loadConfigFile(options.config) : {};
    const config = new ConfigReader(applyCliOverrides(fileData, options));

    port = readLabelerConfig(config).serverPort;
    const store = KubernetesNodeStore.fromKubeConfig(getKubeConfig(config, logger), {
      logger,
      onWatchError: () => diagnostics.recordError(),
    });
    labeler = NodeProviderLabeler.fromConfig(config, { logger, store, diagnostics });
  } catch (error) {
    logStartupError(logger, error);
    process.exit(1);
  }

  const app = express().use(await createRouter({ logger, diagnostics }));
  const server = app.listen(port, () => logger.info(`Health endpoint listening on port ${port}`));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    labeler.stop().then(
      () => process.exit(0),
      error => {
        logger.error(`Shutdown failed: ${stringifyError(error)}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await labeler.start();
  } catch (error) {
    logStartupError(logger, error);
    server.close();
    process.exit(1);
  }
}

if (require.main === module) {
  main(process.argv).catch(error => {
    process.stderr.write(`${stringifyError(error)}\n`);
    process.exit(1);
  });
}
