/**
 * @format
 * Naming Utilities Unit Tests
 *
 * Verifies report file names derived from instance names.
 */

import { join } from 'path';

import { defaultOutputPath, sanitizeFileName } from '../../../lib/utilities/naming';

describe('Naming Utilities', () => {
    describe('sanitizeFileName', () => {
        it('should replace forward and back slashes with underscores', () => {
            expect(sanitizeFileName('team/web\\01')).toBe('team_web_01');
        });

        it('should leave other characters alone', () => {
            expect(sanitizeFileName('web-01.prod')).toBe('web-01.prod');
        });
    });

    describe('defaultOutputPath', () => {
        it('should place the report under output/', () => {
            expect(defaultOutputPath('web-01')).toBe(join('output', 'web-01_details.json'));
        });

        it('should sanitize the name', () => {
            expect(defaultOutputPath('apps/web-01')).toBe(join('output', 'apps_web-01_details.json'));
        });

        it('should accept another directory', () => {
            expect(defaultOutputPath('web-01', 'reports')).toBe(join('reports', 'web-01_details.json'));
        });
    });
});
