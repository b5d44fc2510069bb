import { loadConfig } from '../src/config.js';
import { createContainer } from '../src/container.js';
import { DEFAULTS } from '../src/types/index.js';

describe('loadConfig', () => {
    test('defaults', () => {
        expect(loadConfig({})).toEqual({ maxVariables: 16, delimiter: ',', verbosity: 'standard' });
        expect(loadConfig({})).toEqual(DEFAULTS);
    });

    test('reads environment overrides', () => {
        expect(loadConfig({
            TRUTHTABLE_MAX_VARIABLES: '8',
            TRUTHTABLE_DELIMITER: 'tab',
            TRUTHTABLE_VERBOSITY: 'detailed',
        })).toEqual({ maxVariables: 8, delimiter: '\t', verbosity: 'detailed' });
    });

    test('ignores unrelated variables', () => {
        expect(loadConfig({ HOME: '/tmp', TRUTHTABLE_DELIMITER: 'comma' }).delimiter).toBe(',');
    });

    test.each([
        ['TRUTHTABLE_MAX_VARIABLES', 'many'],
        ['TRUTHTABLE_MAX_VARIABLES', '27'],
        ['TRUTHTABLE_DELIMITER', 'semicolon'],
        ['TRUTHTABLE_VERBOSITY', 'loud'],
    ])('rejects %s=%s', (name, value) => {
        expect(() => loadConfig({ [name]: value })).toThrow(`Invalid configuration ${name}`);
    });
});

describe('createContainer', () => {
    test('holds the given configuration', () => {
        const config = { maxVariables: 4, delimiter: ',' as const, verbosity: 'minimal' as const };
        expect(createContainer(config).config).toBe(config);
    });
});
