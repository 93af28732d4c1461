import { beforeEach, describe, expect, it, vi } from 'vitest';
import { OIDS, SnmpWalker } from './walker.js';
import { SnmpError } from '../utils/errors.js';
import { TEST_TARGET } from '../__tests__/fakes.js';

const NO_SUCH_OBJECT = 128;

interface FakeVarbind {
    oid: string;
    type: number;
    value: Buffer | string | null;
}

type Feed = (varbinds: FakeVarbind[]) => boolean | void;
type Done = (error?: Error | null) => void;

/**
 * Session that replays pages of varbinds into the feed callback, then reports
 * the configured outcome to the done callback.
 */
class FakeSession {
    closed = false;
    pagesFed = 0;
    private pages: FakeVarbind[][];
    private outcome: { doneError?: Error; socketError?: Error };
    private errorListener: ((error: Error) => void) | null = null;

    constructor(pages: FakeVarbind[][], outcome: { doneError?: Error; socketError?: Error } = {}) {
        this.pages = pages;
        this.outcome = outcome;
    }

    on(event: string, listener: (error: Error) => void): this {
        if (event === 'error') {
            this.errorListener = listener;
        }
        return this;
    }

    subtree(_oid: string, _maxRepetitions: number, feed: Feed, done: Done): void {
        if (this.outcome.socketError) {
            this.errorListener?.(this.outcome.socketError);
            return;
        }
        for (const page of this.pages) {
            this.pagesFed++;
            if (feed(page)) {
                done(null);
                return;
            }
        }
        done(this.outcome.doneError ?? null);
    }

    close(): void {
        this.closed = true;
    }
}

const { createSession } = vi.hoisted(() => ({ createSession: vi.fn() }));

vi.mock('net-snmp', () => ({
    Version2c: 1,
    createSession,
    isVarbindError: (varbind: FakeVarbind) => varbind.type === NO_SUCH_OBJECT,
    varbindError: (varbind: FakeVarbind) => `NoSuchObject: ${varbind.oid}`,
}));

function octets(oid: string, text: string): FakeVarbind {
    return { oid, type: 4, value: Buffer.from(text) };
}

describe('SnmpWalker', () => {
    const walker = new SnmpWalker();

    beforeEach(() => {
        createSession.mockReset();
    });

    it('returns rows in walk order with their index suffix', async () => {
        const session = new FakeSession([
            [octets(`${OIDS.ifDescr}.501`, 'ae0.1000'), octets(`${OIDS.ifDescr}.502`, 'ge-0/0/0')],
            [octets(`${OIDS.ifDescr}.503`, 'ae1.20')],
        ]);
        createSession.mockReturnValue(session);

        const rows = await walker.walk(OIDS.ifDescr, TEST_TARGET);

        expect(rows).toEqual([
            { oid: `${OIDS.ifDescr}.501`, oidSuffix: '501', value: 'ae0.1000' },
            { oid: `${OIDS.ifDescr}.502`, oidSuffix: '502', value: 'ge-0/0/0' },
            { oid: `${OIDS.ifDescr}.503`, oidSuffix: '503', value: 'ae1.20' },
        ]);
        expect(createSession).toHaveBeenCalledWith('192.0.2.1', 'public', {
            port: 161,
            version: 1,
            timeout: 5000,
            retries: 1,
        });
        expect(session.closed).toBe(true);
    });

    it('renders non-buffer values as strings', async () => {
        createSession.mockReturnValue(new FakeSession([
            [{ oid: `${OIDS.ipAdEntNetMask}.10.0.0.1`, type: 64, value: '255.255.255.0' }],
        ]));

        const rows = await walker.walk(OIDS.ipAdEntNetMask, TEST_TARGET);

        expect(rows).toEqual([
            { oid: `${OIDS.ipAdEntNetMask}.10.0.0.1`, oidSuffix: '10.0.0.1', value: '255.255.255.0' },
        ]);
    });

    it('keeps the last value of a repeated OID at its first position', async () => {
        createSession.mockReturnValue(new FakeSession([
            [octets(`${OIDS.ifDescr}.1`, 'first')],
            [octets(`${OIDS.ifDescr}.2`, 'second')],
            [octets(`${OIDS.ifDescr}.1`, 'replaced')],
        ]));

        const rows = await walker.walk(OIDS.ifDescr, TEST_TARGET);

        expect(rows.map(entry => [entry.oidSuffix, entry.value])).toEqual([
            ['1', 'replaced'],
            ['2', 'second'],
        ]);
    });

    it('fails the walk on a transport error and drops partial rows', async () => {
        const session = new FakeSession(
            [[octets(`${OIDS.ifDescr}.501`, 'ae0.1000')]],
            { doneError: new Error('Request timed out') }
        );
        createSession.mockReturnValue(session);

        const walk = walker.walk(OIDS.ifDescr, TEST_TARGET);

        await expect(walk).rejects.toBeInstanceOf(SnmpError);
        await expect(walk).rejects.toThrow(`SNMP walk of ${OIDS.ifDescr} on 192.0.2.1 failed: Request timed out`);
        expect(session.closed).toBe(true);
    });

    it('stops at the first varbind error', async () => {
        const session = new FakeSession([
            [{ oid: `${OIDS.ifDescr}.9`, type: NO_SUCH_OBJECT, value: null }],
            [octets(`${OIDS.ifDescr}.10`, 'ae0.10')],
        ]);
        createSession.mockReturnValue(session);

        await expect(walker.walk(OIDS.ifDescr, TEST_TARGET))
            .rejects.toThrow(`SNMP walk of ${OIDS.ifDescr} on 192.0.2.1 failed: NoSuchObject: ${OIDS.ifDescr}.9`);
        expect(session.pagesFed).toBe(1);
        expect(session.closed).toBe(true);
    });

    it('fails on a session error event', async () => {
        const session = new FakeSession([], { socketError: new Error('bind EACCES') });
        createSession.mockReturnValue(session);

        await expect(walker.walk(OIDS.ifDescr, TEST_TARGET)).rejects.toThrow('bind EACCES');
        expect(session.closed).toBe(true);
    });

    it('wraps a failure to open the session', async () => {
        createSession.mockImplementation(() => {
            throw new Error('getaddrinfo ENOTFOUND');
        });

        await expect(walker.walk(OIDS.ifDescr, TEST_TARGET))
            .rejects.toMatchObject({ code: 'SNMP_TRANSPORT', context: { host: '192.0.2.1', oid: OIDS.ifDescr } });
    });
});
