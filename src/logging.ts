import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	/** Log file path; null means stderr. */
	file: string | null;
};
export type LoggerResolvedSettings = ResolvedSettings;

type ClosableDestination = DestinationStream & {
	flushSync?: () => void;
	end?: () => void;
};

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: ClosableDestination | null = null;
let overrideSettings: LoggerSettings | null = null;

function isLevel(value: string): value is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const cfg: LoggingConfig | undefined = overrideSettings ?? loadConfig().logging;
	return { level: normalizeLevel(cfg?.level), file: cfg?.file ?? null };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: ClosableDestination): void {
	try {
		dest.flushSync?.();
	} catch {
		// SonicBoom throws if nothing was ever written
	}
	// stderr must stay open for the rest of the process
	if (cachedSettings?.file) {
		dest.end?.();
	}
}

function openDestination(file: string | null): ClosableDestination {
	if (!file) {
		return pino.destination({ dest: 2, sync: true });
	}

	// Log files can contain request paths; keep them owner-only.
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	try {
		const fd = fs.openSync(file, fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL, 0o600);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
			throw err;
		}
	}
	return pino.destination({ dest: file, mkdir: true, sync: true });
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: ClosableDestination } {
	const destination = openDestination(settings.file);
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: ["token", "*.token", "password", "*.password", "secretId", "*.secretId"],
				censor: "[REDACTED]",
			},
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings): Logger {
	return getLogger().child(bindings ?? {});
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
