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
import express from 'express';
import Router from 'express-promise-router';
import { Logger } from 'winston';
import { Diagnostics } from '../helpers/diagnostics';

export interface RouterOptions {
  logger: Logger;
  diagnostics: Diagnostics;
}

const healthStatus = (diagnostics: Diagnostics): [number, string] => {
  if (!diagnostics.isReady()) {
    return [503, 'Not Ready'];
  }
  if (diagnostics.recentErrorCount() > 0) {
    return [500, 'Unhealthy'];
  }
  return [200, 'OK'];
};

export async function createRouter(
  options: RouterOptions,
): Promise<express.Router> {
  const { logger, diagnostics } = options;

  const router = Router();

  router.get('/health', (_, response) => {
    const [code, status] = healthStatus(diagnostics);
    if (code !== 200) {
      logger.debug(`Health check answered ${code} ${status}`);
    }

    response.status(code).json({ status, ...diagnostics.status() });
  });

  return router;
}
