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

import { Diagnostics } from './diagnostics';

describe('Diagnostics', () => {
    let now = 0;
    const diagnostics = () => new Diagnostics({ now: () => now, errorWindowMs: 60_000 });

    beforeEach(() => {
        now = Date.parse('2024-01-01T00:00:00Z');
    });

    it('is not ready until marked', () => {
        const d = diagnostics();

        expect(d.isReady()).toBe(false);
        d.markReady();
        expect(d.isReady()).toBe(true);
    });

    it('only counts errors inside the window', () => {
        const d = diagnostics();
        d.recordError();
        now += 30_000;
        d.recordError();

        expect(d.recentErrorCount()).toBe(2);

        now += 40_000;
        expect(d.recentErrorCount()).toBe(1);

        now += 30_000;
        expect(d.recentErrorCount()).toBe(0);
    });

    it('reports the last event time', () => {
        const d = diagnostics();
        expect(d.status()).toEqual({ ready: false, lastEvent: undefined, recentErrors: 0 });

        d.recordEvent();
        d.markReady();

        expect(d.status()).toEqual({
            ready: true,
            lastEvent: '2024-01-01T00:00:00.000Z',
            recentErrors: 0,
        });
    });
});
