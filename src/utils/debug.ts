import type { CodecOptions } from '../types/Types';

export function dbg(opts: CodecOptions | undefined, ...args: unknown[]) {
	if (opts?.debug) {
		// eslint-disable-next-line no-console
		console.log('[hevc]', ...args);
	}
}
