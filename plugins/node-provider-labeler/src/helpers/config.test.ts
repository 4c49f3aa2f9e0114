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
import {
    compileTemplateSpecs,
    parseTemplateFlag,
    readLabelerConfig,
    TemplateConfigError,
} from './config';

describe('parseTemplateFlag', () => {
    it('splits the key from the template on the first equals sign', () => {
        expect(parseTemplateFlag('instance={:last}', 'label')).toEqual({
            key: 'instance',
            template: '{:last}',
            domain: 'label',
        });
        expect(parseTemplateFlag('example.com/id={0}={1}', 'annotation')).toEqual({
            key: 'example.com/id',
            template: '{0}={1}',
            domain: 'annotation',
        });
    });

    it('leaves the template unset when only a key is given', () => {
        expect(parseTemplateFlag('instance', 'label')).toEqual({
            key: 'instance',
            domain: 'label',
        });
    });
});

describe('readLabelerConfig', () => {
    it('uses the default label when nothing is configured', () => {
        const result = readLabelerConfig(new ConfigReader({}));

        expect(result).toEqual({
            templates: [{ key: 'provider-id', template: '{:last}', domain: 'label' }],
            requeueInterval: { hours: 1 },
            debounce: { milliseconds: 500 },
            concurrency: 2,
            backoff: {
                initial: { seconds: 1 },
                max: { minutes: 1 },
            },
            serverPort: 8080,
        });
    });

    it('reads labels before annotations in their configured order', () => {
        const config = new ConfigReader({
            nodeProviderLabeler: {
                labels: [{ key: 'zone', template: '{1}' }, { key: 'instance' }],
                annotations: [{ key: 'example.com/provider-id', template: '{:provider}://{:all}' }],
            },
        });

        expect(readLabelerConfig(config).templates).toEqual([
            { key: 'zone', template: '{1}', domain: 'label' },
            { key: 'instance', template: undefined, domain: 'label' },
            { key: 'example.com/provider-id', template: '{:provider}://{:all}', domain: 'annotation' },
        ]);
    });

    it('does not add the default label when only annotations are configured', () => {
        const config = new ConfigReader({
            nodeProviderLabeler: {
                annotations: [{ key: 'instance' }],
            },
        });

        expect(readLabelerConfig(config).templates).toEqual([
            { key: 'instance', template: undefined, domain: 'annotation' },
        ]);
    });

    it('reads durations and tuning settings', () => {
        const config = new ConfigReader({
            nodeProviderLabeler: {
                requeueInterval: { minutes: 30 },
                debounce: { seconds: 2 },
                concurrency: 5,
                backoff: {
                    initial: { milliseconds: 250 },
                    max: { seconds: 30 },
                },
                server: { port: 9090 },
            },
        });

        const result = readLabelerConfig(config);

        expect(result.requeueInterval).toEqual({ minutes: 30 });
        expect(result.debounce).toEqual({ seconds: 2 });
        expect(result.concurrency).toBe(5);
        expect(result.backoff).toEqual({
            initial: { milliseconds: 250 },
            max: { seconds: 30 },
        });
        expect(result.serverPort).toBe(9090);
    });

    it('rejects a concurrency below one', () => {
        const config = new ConfigReader({
            nodeProviderLabeler: { concurrency: 0 },
        });

        expect(() => readLabelerConfig(config)).toThrow(
            'nodeProviderLabeler.concurrency must be a positive integer, got 0',
        );
    });
});

describe('compileTemplateSpecs', () => {
    it('compiles a spec for each source', () => {
        const specs = compileTemplateSpecs([
            { key: 'provider-id', domain: 'label' },
            { key: 'example.com/all', template: '{:all}', domain: 'annotation' },
        ]);

        expect(specs).toEqual([
            {
                key: 'provider-id',
                domain: 'label',
                template: {
                    source: '{:last}',
                    domain: 'label',
                    segments: [{ type: 'token', token: { type: 'last' } }],
                },
            },
            {
                key: 'example.com/all',
                domain: 'annotation',
                template: {
                    source: '{:all}',
                    domain: 'annotation',
                    segments: [{ type: 'token', token: { type: 'all' } }],
                },
            },
        ]);
        expect(Object.isFrozen(specs[0])).toBe(true);
    });

    it('allows the same key as both a label and an annotation', () => {
        expect(
            compileTemplateSpecs([
                { key: 'instance', domain: 'label' },
                { key: 'instance', domain: 'annotation' },
            ]),
        ).toHaveLength(2);
    });

    it('reports every problem together', () => {
        let caught: unknown;
        try {
            compileTemplateSpecs([
                { key: 'unknown', template: '{unknown}', domain: 'label' },
                { key: 'fine', template: '{0}', domain: 'label' },
                { key: '-bad', template: '{0}', domain: 'label' },
                { key: 'fine', template: '{1}', domain: 'label' },
                { key: 'open', template: '{:last', domain: 'annotation' },
            ]);
        } catch (error) {
            caught = error;
        }

        if (!(caught instanceof TemplateConfigError)) {
            throw new Error('expected a TemplateConfigError');
        }
        expect(caught.problems).toEqual([
            "label 'unknown': UnknownToken: unknown token '{unknown}' at position 0 in template '{unknown}'",
            "label '-bad': invalid name (must start and end with an alphanumeric character)",
            "label 'fine': configured more than once",
            "annotation 'open': MalformedTemplate: unclosed '{' at position 0 in template '{:last'",
        ]);
    });
});
