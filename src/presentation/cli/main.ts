import { Config, getConfig, validateConfig } from '../../config';
import { PUSHOVER_SOUNDS } from '../../domain/entities/Notification';
import { ValidationError } from '../../domain/errors';
import { createPushoverClient } from '../../infrastructure/notifications/PushoverClientFactory';
import { CliCommand, USAGE, parseCliArgs } from './args';

export const EXIT_SUCCESS = 0;
/** Failure result or configuration error */
export const EXIT_FAILURE = 1;
/** Usage or validation error */
export const EXIT_USAGE = 2;

function reportConfigErrors(errors: string[]): number {
    console.error('❌ Configuration validation failed:');
    errors.forEach((error) => console.error(`  - ${error}`));
    return EXIT_FAILURE;
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
    let command: CliCommand;
    try {
        command = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof ValidationError) {
            console.error(`❌ ${error.message}\n\n${USAGE}`);
            return EXIT_USAGE;
        }
        throw error;
    }

    if (command.kind === 'help') {
        console.log(USAGE);
        return EXIT_SUCCESS;
    }
    if (command.kind === 'list-sounds') {
        console.log(PUSHOVER_SOUNDS.join('\n'));
        return EXIT_SUCCESS;
    }

    let config: Config;
    try {
        config = getConfig();
    } catch (error) {
        return reportConfigErrors([error instanceof Error ? error.message : String(error)]);
    }

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        return reportConfigErrors(configErrors);
    }

    try {
        const client = createPushoverClient(config);
        const result = await client.notify(command.message, {
            deviceId: config.defaultDevice,
            sound: config.defaultSound,
            priority: config.defaultPriority,
            ...command.options,
        });

        if (result.success) {
            console.log(`✅ ${result.detail}${result.requestId ? ` (request ${result.requestId})` : ''}`);
            return EXIT_SUCCESS;
        }
        console.error(`❌ ${result.detail}`);
        return EXIT_FAILURE;
    } catch (error) {
        if (error instanceof ValidationError) {
            console.error(`❌ ${error.message}`);
            return EXIT_USAGE;
        }
        throw error;
    }
}
