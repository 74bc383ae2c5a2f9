import { channelTitle } from './titles.js';

export interface PlaylistEntry {
	surfaceId: number;
	venueName: string;
	surfaceName: string;
	city: string;
	state: string;
}

export interface PlaylistOptions {
	/** e.g. http://192.168.1.10:5000 */
	baseUrl: string;
	groupTitle: string;
	placeholderSeconds: number;
}

/*
-----
#EXTM3U
#EXTINF:-1 channel-id="864" channel-number="864" tvg-id="864" tvg-name="Chiller Dublin - Rink 1" group-title="LiveBarn" tvc-guide-title="LIVE: Chiller Dublin - Rink 1" ... ,Chiller Dublin - Rink 1 (Dublin, OH)
http://192.168.1.10:5000/proxy/864
-----
*/

// attribute values are double-quoted
const attr = (value: string) => value.replace(/"/g, "'");

const location = (city: string, state: string): string => {
	if (city && state) return ` (${city}, ${state})`;
	if (city || state) return ` (${city || state})`;
	return '';
};

/**
 * M3U playlist with the Channels DVR `tvc-guide-*` attributes; each entry
 * points at this server's proxy for the surface.
 */
function buildPlaylist(entries: PlaylistEntry[], options: PlaylistOptions): string {
	const lines = ['#EXTM3U'];
	for (const entry of entries) {
		const title = channelTitle(entry.venueName, entry.surfaceName);
		let description = `Live camera feed from ${entry.venueName} - ${entry.surfaceName}`;
		if (entry.city && entry.state)
			description += ` in ${entry.city}, ${entry.state}`;

		const id = String(entry.surfaceId);
		const attributes = [
			`channel-id="${id}"`,
			`channel-number="${id}"`,
			`tvg-id="${id}"`,
			`tvg-name="${attr(title)}"`,
			`group-title="${attr(options.groupTitle)}"`,
			`tvc-guide-title="LIVE: ${attr(title)}"`,
			`tvc-guide-description="${attr(description)}"`,
			`tvc-guide-tags="Live, HDTV"`,
			`tvc-guide-genres="Sports"`,
			`tvc-guide-placeholders="${options.placeholderSeconds}"`,
		];
		lines.push(`#EXTINF:-1 ${attributes.join(' ')},${title}${location(entry.city, entry.state)}`);
		lines.push(`${options.baseUrl}/proxy/${id}`);
	}
	return lines.join('\n');
}

export { buildPlaylist };
