import { createLogger, format, transports, config, Logger } from 'winston';
import { inspect } from 'util';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type TLogLevel = typeof LOG_LEVELS[number];

const SPLAT = Symbol.for('splat');

// the more verbose of the two transport levels
export const lowerLevel = (a?: TLogLevel, b?: TLogLevel): TLogLevel => {
    if (!a || !b)
        return a || b || 'info';
    return config.npm.levels[a] >= config.npm.levels[b] ? a : b;
};

export const getLogger = ({ file, con, silent }: {
    con?: {
        level: TLogLevel;
    },
    file?: {
        name: string;
        level: TLogLevel;
    },
    silent?: boolean;
}): Logger => createLogger({
    level: lowerLevel(con?.level, file?.level),
    silent,
    format: format.combine(
        format.timestamp(),
        format.printf((info) => {
            const timestamp = String(info.timestamp).trim();
            const mLevel = info.level;
            const message = String(info.message ?? '').trim();
            const args: unknown = Reflect.get(info, SPLAT);
            const strArgs = (Array.isArray(args) ? args : []).map((arg: unknown) => {
                return inspect(arg, {
                    colors: !file && !!process.stdout.isTTY
                });
            }).join(' ');
            return `[${timestamp}] ${mLevel} ${message} ${strArgs}`.trimEnd();
        })
    ),
    transports: [
        ...(file ? [new transports.File({ filename: file.name, level: file.level })] : []),
        ...(con ? [new transports.Console({ level: con.level })] : [])
    ]
});

export const defaultLogger = getLogger({ con: { level: 'info' } });
