import { describe, expect, it } from 'vitest';
import { detectLanAddress, publicBaseUrl } from '../../app/services/detect.js';

describe('detectLanAddress', () => {
    it('picks the first external IPv4 address', () => {
        expect(detectLanAddress({
            lo: [{ address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }],
            eth0: [
                { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '02:00:00:00:00:01', internal: false, cidr: 'fe80::1/64', scopeid: 2 },
                { address: '192.168.1.10', netmask: '255.255.255.0', family: 'IPv4', mac: '02:00:00:00:00:01', internal: false, cidr: '192.168.1.10/24' },
            ],
        })).toBe('192.168.1.10');
    });

    it('falls back to loopback', () => {
        expect(detectLanAddress({})).toBe('127.0.0.1');
    });
});

describe('publicBaseUrl', () => {
    it('uses the configured host', () => {
        expect(publicBaseUrl('rinks.local', 5000)).toBe('http://rinks.local:5000');
    });
});
