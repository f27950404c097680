import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_POLICY, mergeConfig, resolvePolicy } from '../../src/config/ParserConfig.js';

describe('ParserConfig', () => {
    describe('DEFAULT_POLICY', () => {
        it('should hold the tolerant defaults', () => {
            expect(DEFAULT_POLICY).toEqual({
                strictDescriptionSeparator: false,
                acceptedVersions: [2, 3],
                permissionsRequiredFrom: 3,
                allowNullArrayElements: false,
            });
        });
    });

    describe('resolvePolicy()', () => {
        it('should return the defaults for no overrides', () => {
            expect(resolvePolicy()).toEqual(DEFAULT_POLICY);
        });

        it('should override only what is set', () => {
            expect(resolvePolicy({ acceptedVersions: [3], allowNullArrayElements: undefined })).toEqual({
                ...DEFAULT_POLICY,
                acceptedVersions: [3],
            });
        });
    });

    describe('mergeConfig()', () => {
        it('should fill every default for an empty config', () => {
            expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
        });

        it('should merge each level independently', () => {
            const config = mergeConfig({
                input: './docs',
                failFast: false,
                policy: { strictDescriptionSeparator: true },
                discovery: { skipFiles: ['CHANGELOG.md'] },
            });

            expect(config.input).toBe('./docs');
            expect(config.output).toBeUndefined();
            expect(config.format).toBe('json');
            expect(config.failFast).toBe(false);
            expect(config.policy.strictDescriptionSeparator).toBe(true);
            expect(config.policy.acceptedVersions).toEqual([2, 3]);
            expect(config.discovery).toEqual({
                skipDirectories: ['version'],
                skipFiles: ['CHANGELOG.md'],
                extensions: ['.md'],
            });
        });

        it('should omit unset optional paths', () => {
            expect('input' in mergeConfig({ input: undefined })).toBe(false);
        });
    });
});
