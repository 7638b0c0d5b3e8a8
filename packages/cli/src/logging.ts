import type { ILogger } from 'ragbridge'
import { ConsoleLogger, NullLogger } from 'ragbridge'

/** Quiet by default so log lines do not interleave with spinners and answers. */
export function createLogger(verbose: boolean | undefined): ILogger {
	return verbose ? new ConsoleLogger({ level: 'debug' }) : new NullLogger()
}
