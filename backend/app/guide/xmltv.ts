import xml2js from 'xml2js';
import { DateTime } from 'luxon';
import { OPEN_ICE } from '../schedule/timeline.js';
import type { ProgrammeBlock } from '../schedule/types.js';
import { channelTitle, sanitizeTitle } from './titles.js';

export interface GuideChannel {
    surfaceId: number;
    venueName: string;
    surfaceName: string;
    programmes: ProgrammeBlock[];
}

export interface XmltvOptions {
    generatorName: string;
    /** Zone the start/stop attributes are written in; process-local when absent. */
    timeZone?: string;
}

interface TextNode {
    _: string;
    $: { lang: string };
}

interface ProgrammeNode {
    $: { channel: string; start: string; stop: string };
    title: TextNode[];
    desc: TextNode[];
    category: TextNode[];
    live?: string[];
}

const en = (text: string): TextNode => ({ _: text, $: { lang: 'en' } });

/**
 * XMLTV timestamp: YYYYMMDDHHmmss +HHMM
 */
function formatXMLTVTime(instant: Date, timeZone?: string): string {
    const dt = timeZone ? DateTime.fromJSDate(instant, { zone: timeZone }) : DateTime.fromJSDate(instant);
    return dt.toFormat('yyyyMMddHHmmss ZZZ');
}

/**
 * Render the guide: every channel first, then every programme. Only real
 * bookings are tagged as live sport; filler blocks carry just the generic
 * category.
 */
function buildXMLTV(channels: GuideChannel[], options: XmltvOptions): string {
    const channelNodes = channels.map(ch => ({
        $: { id: String(ch.surfaceId) },
        'display-name': [channelTitle(ch.venueName, ch.surfaceName)],
    }));

    const programmeNodes: ProgrammeNode[] = channels.flatMap(ch => {
        const place = `${ch.venueName} - ${ch.surfaceName}`;
        return ch.programmes.map(prog => {
            const isFiller = prog.title === OPEN_ICE;
            const node: ProgrammeNode = {
                $: {
                    channel: String(ch.surfaceId),
                    start: formatXMLTVTime(prog.start, options.timeZone),
                    stop: formatXMLTVTime(prog.end, options.timeZone),
                },
                title: [en(sanitizeTitle(prog.title))],
                desc: [en(isFiller ? `Open practice time at ${place}` : `${prog.title} at ${place}`)],
                category: isFiller ? [en('Sports')] : [en('Sports'), en('Ice Hockey')],
            };
            if (!isFiller)
                node.live = [''];
            return node;
        });
    });

    const builder = new xml2js.Builder({
        xmldec: { version: '1.0', encoding: 'UTF-8' },
        renderOpts: { pretty: true, indent: '  ', newline: '\n' },
    });
    return builder.buildObject({
        tv: {
            $: { 'generator-info-name': options.generatorName },
            channel: channelNodes,
            programme: programmeNodes,
        },
    });
}

export { buildXMLTV, formatXMLTVTime };
