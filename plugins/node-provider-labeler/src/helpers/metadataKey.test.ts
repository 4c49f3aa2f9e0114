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

import { validateMetadataKey } from './metadataKey';

describe('validateMetadataKey', () => {
    it.each([
        'app',
        'provider-id',
        'domain.com/app',
        'sub.domain.com/app',
        'node.example.com/instance_id.v1',
    ])('accepts %j', key => {
        expect(validateMetadataKey(key)).toBeUndefined();
    });

    it.each([
        ['app=test=test2', "invalid name (invalid character '=')"],
        ['app~1', "invalid name (invalid character '~')"],
        ['-app', 'invalid name (must start and end with an alphanumeric character)'],
        ['app-', 'invalid name (must start and end with an alphanumeric character)'],
        ['', 'invalid name (must start and end with an alphanumeric character)'],
        [`x${'-'.repeat(62)}x`, 'invalid name (> 63 characters)'],
        ['domain.com/app/v1', 'invalid key'],
        ['domai~n.com/app', "invalid prefix (invalid character '~')"],
        ['domain..com/app', 'invalid prefix (dns label < 1 character)'],
        ['/app', 'invalid prefix (dns label < 1 character)'],
        ['domain.-x.com/app', 'invalid prefix (must start and end with an alphanumeric character)'],
        [`domain.${'x'.repeat(64)}.com/app`, 'invalid prefix (dns label > 63 characters)'],
        [`${'x.'.repeat(127)}com/app`, 'invalid prefix (> 253 characters)'],
        ['domain.com/-app', 'invalid name (must start and end with an alphanumeric character)'],
    ])('rejects %j', (key, message) => {
        expect(validateMetadataKey(key)).toBe(message);
    });
});
