import os from 'node:os';

type Interfaces = ReturnType<typeof os.networkInterfaces>;

/**
 * First non-internal IPv4 address, so playlist URLs work from other
 * machines on the LAN. Falls back to loopback.
 */
export function detectLanAddress(interfaces: Interfaces = os.networkInterfaces()): string {
    for (const entries of Object.values(interfaces)) {
        for (const entry of entries ?? []) {
            if (entry.family === 'IPv4' && !entry.internal)
                return entry.address;
        }
    }
    return '127.0.0.1';
}

export function publicBaseUrl(host: string | undefined, port: number): string {
    return `http://${host ?? detectLanAddress()}:${port}`;
}
