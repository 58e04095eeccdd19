/**
 * Argument parsing for run-eod-strikes.
 */

import { parseDateOnly } from "@eodgex/domain";
import { UsageError } from "../contexts/eod-strikes/errors.js";

export interface EodCliOptions {
	/** Stored date override */
	storedDate?: Date;
	sourceDate?: Date;
	token?: string;
	dryRun: boolean;
	help: boolean;
}

const VALUE_FLAGS = ["--date", "--source-date", "--token"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
	return VALUE_FLAGS.some((f) => f === flag);
}

function parseDateFlag(flag: string, value: string): Date {
	const date = parseDateOnly(value);
	if (!date) {
		throw new UsageError(`${flag} must be a date in YYYY-MM-DD form, got "${value}"`);
	}
	return date;
}

/**
 * Accepts `--flag=value` and `--flag value`.
 *
 * @throws {UsageError} on unknown flags, missing values and malformed dates
 */
export function parseEodArgs(argv: readonly string[]): EodCliOptions {
	const options: EodCliOptions = { dryRun: false, help: false };

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";

		if (arg === "--dry-run") {
			options.dryRun = true;
			continue;
		}
		if (arg === "--help" || arg === "-h") {
			options.help = true;
			continue;
		}

		const eq = arg.indexOf("=");
		const flag = eq === -1 ? arg : arg.slice(0, eq);
		if (!isValueFlag(flag)) {
			throw new UsageError(`Unknown option: ${arg}`);
		}

		let value: string | undefined;
		if (eq === -1) {
			i++;
			value = argv[i];
		} else {
			value = arg.slice(eq + 1);
		}
		if (!value) {
			throw new UsageError(`${flag} requires a value`);
		}

		switch (flag) {
			case "--date":
				options.storedDate = parseDateFlag(flag, value);
				break;
			case "--source-date":
				options.sourceDate = parseDateFlag(flag, value);
				break;
			case "--token":
				options.token = value;
				break;
		}
	}

	return options;
}

export const USAGE = `
EOD Strike Gamma Ingestion

Usage:
  npm run eod:run -- [options]

Options:
  --date=YYYY-MM-DD         Date to store the snapshot under (default: policy applied to today)
  --source-date=YYYY-MM-DD  Provider date to fetch (default: most recent earlier date with data)
  --token=TOKEN             Provider token (default: ORATS_TOKEN)
  --dry-run                 Fetch and derive rows without writing
  --help                    Show this message

Exit codes:
  0  success, or no data to write
  1  unexpected error or bad arguments
  2  missing or rejected token
  3  no source date with data in the lookback window
  4  strike fetch failed
`;
