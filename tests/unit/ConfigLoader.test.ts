import { getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';
import { NotificationPriority } from '../../src/domain/entities/Notification';
import { DEFAULT_TIMEOUT_MS, PUSHOVER_API_URL } from '../../src/infrastructure/notifications/PushoverNotificationClient';

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        for (const key of Object.keys(process.env)) {
            if (key.startsWith('PUSHOVER_')) {
                delete process.env[key];
            }
        }
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should apply defaults when only credentials are set', () => {
        process.env.PUSHOVER_USER_KEY = 'test-user-key';
        process.env.PUSHOVER_API_TOKEN = 'test-app-token';

        expect(loadConfig()).toEqual({
            userKey: 'test-user-key',
            apiToken: 'test-app-token',
            apiUrl: 'https://api.pushover.net/1/messages.json',
            timeoutMs: 15000,
            defaultDevice: undefined,
            defaultSound: 'persistent',
            defaultPriority: NotificationPriority.NORMAL,
            oversizePolicy: 'reject',
        });
    });

    it('should take endpoint and timeout defaults from the client', () => {
        const config = loadConfig();

        expect(config.apiUrl).toBe(PUSHOVER_API_URL);
        expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    });

    it('should fall back to empty credentials instead of throwing when unset', () => {
        const config = loadConfig();

        expect(config.userKey).toBe('');
        expect(config.apiToken).toBe('');
    });

    it('should strip double quotes from environment variables', () => {
        process.env.PUSHOVER_USER_KEY = '"test-user-key"';
        expect(loadConfig().userKey).toBe('test-user-key');
    });

    it('should strip single quotes from environment variables', () => {
        process.env.PUSHOVER_API_TOKEN = "'test-app-token'";
        expect(loadConfig().apiToken).toBe('test-app-token');
    });

    it('should trim whitespace from environment variables', () => {
        process.env.PUSHOVER_DEVICE = '  desk-phone  ';
        expect(loadConfig().defaultDevice).toBe('desk-phone');
    });

    it('should handle numeric variables with quotes', () => {
        process.env.PUSHOVER_TIMEOUT_MS = '"30000"';
        process.env.PUSHOVER_PRIORITY = '-1';

        const config = loadConfig();
        expect(config.timeoutMs).toBe(30000);
        expect(config.defaultPriority).toBe(NotificationPriority.LOW);
    });

    it('should reject a non-numeric timeout', () => {
        process.env.PUSHOVER_TIMEOUT_MS = 'soon';
        expect(() => loadConfig()).toThrow('Environment variable PUSHOVER_TIMEOUT_MS must be a number, got: soon');
    });

    it('should reject a priority outside the enumeration', () => {
        process.env.PUSHOVER_PRIORITY = '4';
        expect(() => loadConfig()).toThrow('Environment variable PUSHOVER_PRIORITY must be a priority between -2 and 2, got: 4');
    });

    it('should accept the truncate policy in any case', () => {
        process.env.PUSHOVER_OVERSIZE_POLICY = 'TRUNCATE';
        expect(loadConfig().oversizePolicy).toBe('truncate');
    });

    it('should reject an unknown oversize policy', () => {
        process.env.PUSHOVER_OVERSIZE_POLICY = 'drop';
        expect(() => loadConfig()).toThrow('Environment variable PUSHOVER_OVERSIZE_POLICY must be "reject" or "truncate", got: drop');
    });

    it('should report missing credentials', () => {
        expect(validateConfig(loadConfig())).toEqual([
            'PUSHOVER_USER_KEY is required',
            'PUSHOVER_API_TOKEN is required',
        ]);
    });

    it('should report a fractional timeout', () => {
        process.env.PUSHOVER_USER_KEY = 'test-user-key';
        process.env.PUSHOVER_API_TOKEN = 'test-app-token';
        process.env.PUSHOVER_TIMEOUT_MS = '2.5';

        expect(validateConfig(loadConfig())).toEqual(['PUSHOVER_TIMEOUT_MS must be a positive integer']);
    });

    it('should cache the loaded config until reset', () => {
        process.env.PUSHOVER_USER_KEY = 'first-key';
        const first = getConfig();

        process.env.PUSHOVER_USER_KEY = 'second-key';
        expect(getConfig()).toBe(first);

        resetConfig();
        expect(getConfig().userKey).toBe('second-key');
    });
});
