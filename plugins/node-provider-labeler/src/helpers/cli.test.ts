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
import { applyCliOverrides, buildProgram, CliOptions, loadConfigFile } from './cli';
import { readLabelerConfig } from './config';

const parse = (args: string[]): CliOptions =>
    buildProgram()
        .exitOverride()
        .configureOutput({ writeErr: () => undefined })
        .parse(args, { from: 'user' })
        .opts<CliOptions>();

describe('buildProgram', () => {
    beforeEach(() => {
        delete process.env.LOG_LEVEL;
    });

    it('has defaults for every repeatable flag', () => {
        expect(parse([])).toEqual({ label: [], annotation: [], logLevel: 'info' });
    });

    it('collects repeated flags and parses numbers', () => {
        expect(
            parse([
                '-l', 'provider-id',
                '--label', 'example.com/zone={0}',
                '-a', 'example.com/provider-id={:provider}://{:all}',
                '--requeue-duration', '600',
                '--port', '9000',
                '--log-level', 'debug',
                '-c', 'labeler.yaml',
            ]),
        ).toEqual({
            config: 'labeler.yaml',
            label: ['provider-id', 'example.com/zone={0}'],
            annotation: ['example.com/provider-id={:provider}://{:all}'],
            requeueDuration: 600,
            port: 9000,
            logLevel: 'debug',
        });
    });

    it('takes the log level from the environment', () => {
        process.env.LOG_LEVEL = 'warn';

        expect(parse([]).logLevel).toBe('warn');
    });

    it('rejects a requeue duration that is not a positive integer', () => {
        expect(() => parse(['--requeue-duration', '1.5'])).toThrow(
            "error: option '--requeue-duration <seconds>' argument '1.5' is invalid. Not a positive integer.",
        );
    });

    it('rejects an unknown log level', () => {
        expect(() => parse(['--log-level', 'verbose'])).toThrow(/Allowed choices are error, warn, info, debug/);
    });
});

describe('loadConfigFile', () => {
    it('reads a YAML mapping', async () => {
        const data = await loadConfigFile(`${__dirname}/fixtures/config.yaml`);

        expect(data).toEqual({
            nodeProviderLabeler: {
                labels: [
                    { key: 'provider-id' },
                    { key: 'example.com/region', template: '{:first}' },
                ],
                annotations: [
                    { key: 'example.com/provider-id', template: '{:provider}://{:all}' },
                ],
                requeueInterval: '30m',
                server: { port: 9090 },
            },
        });
    });

    it('treats an empty file as empty configuration', async () => {
        expect(await loadConfigFile(`${__dirname}/fixtures/empty.yaml`)).toEqual({});
    });

    it('rejects a file that is not a mapping', async () => {
        const path = `${__dirname}/fixtures/not-a-mapping.yaml`;

        await expect(loadConfigFile(path)).rejects.toThrow(
            `Configuration file ${path} must contain a mapping`,
        );
    });
});

describe('applyCliOverrides', () => {
    const options: CliOptions = { label: [], annotation: [], logLevel: 'info' };

    it('leaves the file configuration alone without flags', () => {
        const data = { nodeProviderLabeler: { concurrency: 4 } };

        expect(applyCliOverrides(data, options)).toEqual(data);
    });

    it('replaces the configured values with flags', () => {
        const data = {
            nodeProviderLabeler: {
                labels: [{ key: 'from-file' }],
                concurrency: 4,
                server: { port: 9090 },
            },
            other: true,
        };

        const result = applyCliOverrides(data, {
            ...options,
            label: ['provider-id', 'example.com/zone={0}'],
            annotation: ['example.com/raw={:provider}://{:all}'],
            requeueDuration: 600,
            port: 9000,
        });

        expect(result).toEqual({
            nodeProviderLabeler: {
                labels: [
                    { key: 'provider-id' },
                    { key: 'example.com/zone', template: '{0}' },
                ],
                annotations: [
                    { key: 'example.com/raw', template: '{:provider}://{:all}' },
                ],
                requeueInterval: { seconds: 600 },
                concurrency: 4,
                server: { port: 9000 },
            },
            other: true,
        });
    });

    it('produces configuration the labeler can read', () => {
        const config = new ConfigReader(
            applyCliOverrides({}, { ...options, label: ['zone={0}'], requeueDuration: 90 }),
        );

        expect(readLabelerConfig(config)).toEqual({
            templates: [{ key: 'zone', template: '{0}', domain: 'label' }],
            requeueInterval: { seconds: 90 },
            debounce: { milliseconds: 500 },
            concurrency: 2,
            backoff: {
                initial: { seconds: 1 },
                max: { minutes: 1 },
            },
            serverPort: 8080,
        });
    });
});
