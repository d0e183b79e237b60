/**
 * CLI argument parsing for pushover-notify.
 */

import { NotificationPriority, NotifyOptions, isNotificationPriority } from '../../domain/entities/Notification';
import { ValidationError } from '../../domain/errors';

export const USAGE = [
    'Usage: pushover-notify <message> [options]',
    '',
    'Options:',
    '  --title <text>        Message title (defaults to the application name)',
    '  --device <name>       Send to one registered device instead of all',
    '  --sound <name>        Notification sound (default: persistent)',
    '  --priority <level>    lowest|low|normal|high|emergency or -2..2',
    '  --url <url>           Supplementary URL',
    '  --url-title <text>    Title for the supplementary URL',
    '  --list-sounds         Print the built-in sound names and exit',
    '  --help                Print this message and exit',
].join('\n');

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'list-sounds' }
    | { kind: 'send'; message: string; options: NotifyOptions };

const PRIORITY_NAMES: Record<string, NotificationPriority> = {
    lowest: NotificationPriority.LOWEST,
    low: NotificationPriority.LOW,
    normal: NotificationPriority.NORMAL,
    high: NotificationPriority.HIGH,
    emergency: NotificationPriority.EMERGENCY,
};

/**
 * Accepts a level name (any case) or its integer value.
 */
export function parsePriority(raw: string): NotificationPriority {
    const named = PRIORITY_NAMES[raw.trim().toLowerCase()];
    if (named !== undefined) {
        return named;
    }
    const numeric = Number(raw);
    if (raw.trim() !== '' && isNotificationPriority(numeric)) {
        return numeric;
    }
    throw new ValidationError('priority', `Unknown priority: ${raw}`);
}

const VALUE_FLAGS = ['--title', '--device', '--sound', '--priority', '--url', '--url-title'];

export function parseCliArgs(argv: string[]): CliCommand {
    if (argv.includes('--help') || argv.includes('-h')) {
        return { kind: 'help' };
    }
    if (argv.includes('--list-sounds')) {
        return { kind: 'list-sounds' };
    }

    const options: NotifyOptions = {};
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }
        if (!VALUE_FLAGS.includes(arg)) {
            throw new ValidationError('argv', `Unknown option: ${arg}`);
        }
        const value = argv[i + 1];
        if (value === undefined) {
            throw new ValidationError('argv', `Missing value for ${arg}`);
        }
        i++;

        switch (arg) {
            case '--title':
                options.title = value;
                break;
            case '--device':
                options.deviceId = value;
                break;
            case '--sound':
                options.sound = value;
                break;
            case '--priority':
                options.priority = parsePriority(value);
                break;
            case '--url':
                options.url = value;
                break;
            case '--url-title':
                options.urlTitle = value;
                break;
        }
    }

    if (positional.length !== 1) {
        throw new ValidationError('message', 'Expected exactly one message argument');
    }

    return { kind: 'send', message: positional[0], options };
}
