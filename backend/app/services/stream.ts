import { spawn, execFile } from 'child_process';
import { promisify } from 'node:util';
import type { Readable } from 'stream';
import type { Response } from 'express';
import { Mutex } from 'async-mutex';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import type { CatalogService } from './catalog.js';

const execFileAsync = promisify(execFile);

export interface StreamProcess {
	readonly stdout: Readable;
	readonly stderr: Readable;
	readonly exitCode: number | null;
	kill(signal?: NodeJS.Signals): boolean;
	once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
	once(event: 'error', listener: (err: Error) => void): unknown;
}

export type Spawner = (command: string, args: string[]) => StreamProcess;
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export type ResolveResult =
	| { ok: true; url: string }
	| { ok: false; status: number; message: string };

export interface StreamOptions {
	streamlink: string;
	refreshMarginMinutes: number;
	firstChunkTimeoutMs: number;
}

const defaultSpawner: Spawner = (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

const defaultRunner: CommandRunner = async (file, args, timeoutMs) => {
	const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs, encoding: 'utf8' });
	return stdout;
};

/**
 * Expiry carried by the CDN token (`hdnts=...~exp=<unix seconds>~...`).
 */
export function parseTokenExpiry(url: string): Date | null {
	const match = url.match(/exp=(\d+)/);
	return match ? new Date(Number(match[1]) * 1000) : null;
}

/**
 * A URL needs a new capture when missing or when its token expires within
 * `marginMinutes`. URLs without an expiry are trusted.
 */
export function needsRefresh(url: string | null | undefined, now: Date, marginMinutes: number): boolean {
	if (!url) return true;
	const expiry = parseTokenExpiry(url);
	if (!expiry) return false;
	return expiry.getTime() - now.getTime() < marginMinutes * 60 * 1000;
}

/**
 * Picks the captured playlist URL out of the capture command's output.
 */
export function extractCapturedUrl(output: string): string | null {
	for (const line of output.split('\n')) {
		const trimmed = line.trim();
		if (/^https?:\/\//.test(trimmed) && trimmed.includes('.m3u8'))
			return trimmed;
	}
	return null;
}

/**
 * Runs the external capture command (browser automation lives there) with
 * the surface id appended, and reads the fresh playlist URL from stdout.
 */
export class StreamCapture {
	constructor(
		private readonly command: string | undefined,
		private readonly timeoutMs: number,
		private readonly run: CommandRunner = defaultRunner,
	) { }

	get configured(): boolean {
		return Boolean(this.command);
	}

	async capture(surfaceId: number): Promise<string> {
		if (!this.command)
			throw new Error('No capture command configured');
		const [file, ...args] = this.command.split(/\s+/);
		const output = await this.run(file, [...args, String(surfaceId)], this.timeoutMs);
		const url = extractCapturedUrl(output);
		if (!url)
			throw new Error(`Capture for surface ${surfaceId} printed no playlist URL`);
		return url;
	}
}

class StreamService {
	locks: Map<number, Mutex> = new Map<number, Mutex>();

	constructor(
		private readonly catalog: Pick<CatalogService, 'getStream' | 'saveStream' | 'getSurfaceInfo'>,
		private readonly capturer: Pick<StreamCapture, 'capture'>,
		private readonly options: StreamOptions,
		private readonly spawner: Spawner = defaultSpawner,
		private readonly clock: () => Date = () => new Date(),
	) { }

	private lock(surfaceId: number): Mutex {
		let mutex = this.locks.get(surfaceId);
		if (!mutex) {
			mutex = new Mutex();
			this.locks.set(surfaceId, mutex);
		}
		return mutex;
	}

	/**
	 * Current playlist URL for the surface, capturing a new one when the stored
	 * token is missing or about to expire. Captures for a surface run one at a
	 * time; a waiter reuses the URL the previous capture stored.
	 */
	resolve(surfaceId: number): Promise<ResolveResult> {
		return this.lock(surfaceId).runExclusive(async (): Promise<ResolveResult> => {
			const stored = this.catalog.getStream(surfaceId);
			const now = this.clock();

			if (stored?.playlistUrl) {
				const expiry = parseTokenExpiry(stored.playlistUrl);
				if (expiry) {
					const minutesLeft = (expiry.getTime() - now.getTime()) / 60000;
					logger.info(`Surface ${surfaceId}: token valid for ${minutesLeft.toFixed(1)} more minutes`);
				}
			}

			if (stored?.playlistUrl && !needsRefresh(stored.playlistUrl, now, this.options.refreshMarginMinutes))
				return { ok: true, url: stored.playlistUrl };

			if (!stored?.playlistUrl && !this.catalog.getSurfaceInfo(surfaceId))
				return { ok: false, status: 404, message: `No stream found for surface ${surfaceId}` };

			logger.info(`Auto-refreshing stream for surface ${surfaceId}...`);
			try {
				const url = await this.capturer.capture(surfaceId);
				this.catalog.saveStream(surfaceId, url);
				logger.info(`Auto-refresh succeeded for surface ${surfaceId}`);
				return { ok: true, url };
			} catch (error) {
				logger.error(`Auto-refresh failed for surface ${surfaceId}: ${errorMessage(error)}`);
				return { ok: false, status: 502, message: `Auto-refresh failed for surface ${surfaceId}` };
			}
		});
	}

	/**
	 * Relay the live feed through streamlink. The response only starts once
	 * the first chunk arrives, so players do not see an empty stream.
	 */
	async relay(surfaceId: number, url: string, res: Response): Promise<void> {
		const info = this.catalog.getSurfaceInfo(surfaceId);
		const name = info ? `${info.venueName} - ${info.surfaceName}` : `surface ${surfaceId}`;
		logger.info(`Streaming ${name}: ${url.slice(0, 80)}...`);

		const proc = this.spawner(this.options.streamlink, ['--stdout', '--loglevel', 'error', url, 'best']);
		let stderr = '';
		proc.stderr.on('data', (data: Buffer) => {
			stderr += data.toString();
		});

		let exited = false;
		let stopping = false;
		const stop = (why: string) => {
			if (stopping || exited || proc.exitCode !== null)
				return;
			stopping = true;
			logger.info(`Stopping streamlink for ${name} (${why})`);
			proc.kill('SIGTERM');
			const timer = setTimeout(() => {
				if (proc.exitCode === null) {
					logger.warn(`Had to kill streamlink for ${name}`);
					proc.kill('SIGKILL');
				}
			}, 2000);
			timer.unref();
		};

		let clientGone = false;
		const started = Date.now();
		const first = await new Promise<Buffer | null>(resolve => {
			const timer = setTimeout(() => resolve(null), this.options.firstChunkTimeoutMs);
			res.once('close', () => {
				clientGone = true;
				clearTimeout(timer);
				stop('client disconnected');
				resolve(null);
			});
			proc.stdout.once('data', (chunk: Buffer) => {
				proc.stdout.pause();
				clearTimeout(timer);
				resolve(chunk);
			});
			proc.once('exit', () => {
				exited = true;
				clearTimeout(timer);
				resolve(null);
			});
			proc.once('error', err => {
				exited = true;
				logger.error(`Cannot start streamlink for ${name}`, err);
				clearTimeout(timer);
				resolve(null);
			});
		});

		if (clientGone) {
			logger.info(`Client left ${name} before the first chunk`);
			return;
		}

		if (!first) {
			logger.error(`No data from streamlink for ${name} after ${((Date.now() - started) / 1000).toFixed(1)}s`);
			if (stderr.trim())
				logger.error(`Streamlink error: ${stderr.trim()}`);
			stop('no data');
			res.status(504).type('text/plain').send(`No video received for surface ${surfaceId}`);
			return;
		}

		logger.info(`Got first chunk for ${name} after ${((Date.now() - started) / 1000).toFixed(1)}s (${first.length} bytes)`);
		res.status(200).set({
			'Content-Type': 'video/mp2t',
			'Cache-Control': 'no-cache, no-store, must-revalidate',
			'Pragma': 'no-cache',
			'Expires': '0',
			'Access-Control-Allow-Origin': '*',
		});
		res.write(first);
		proc.stdout.pipe(res);

		proc.once('exit', () => {
			exited = true;
			logger.info(`Stream ended for ${name}`);
			res.end();
		});
	}
}

export { StreamService };
