import * as http from 'http';
import * as https from 'https';
import { Socket } from 'net';
import { Config } from '../../config';

export type TimeoutPhase = 'connect' | 'write' | 'read';

export type PhasedTimeouts = Pick<Config, 'connectTimeoutMs' | 'readTimeoutMs' | 'writeTimeoutMs'>;

type RequestOptions = http.RequestOptions & { protocol?: string | null };

/**
 * Shape axios expects from its `transport` option.
 */
export interface HttpTransport {
    request(options: RequestOptions, callback: (res: http.IncomingMessage) => void): http.ClientRequest;
}

export class PhaseTimeoutError extends Error {
    public readonly code = 'ETIMEDOUT';

    constructor(
        public readonly phase: TimeoutPhase,
        public readonly timeoutMs: number
    ) {
        super(`${phase} timeout of ${timeoutMs}ms exceeded`);
        this.name = 'PhaseTimeoutError';
    }
}

/**
 * Wraps node's http/https with a socket inactivity timer that moves through
 * connect, write (until the request body is flushed) and read budgets.
 * Each budget bounds inactivity within its phase, not the whole request.
 */
export function createPhasedTimeoutTransport(timeouts: PhasedTimeouts): HttpTransport {
    const budget: Record<TimeoutPhase, number> = {
        connect: timeouts.connectTimeoutMs,
        write: timeouts.writeTimeoutMs,
        read: timeouts.readTimeoutMs,
    };

    return {
        request(options, callback) {
            const client = options.protocol === 'https:' ? https : http;
            const req = client.request(options, callback);
            let bodySent = false;
            let arm: (phase: TimeoutPhase) => void = () => undefined;

            req.once('finish', () => {
                bodySent = true;
                arm('read');
            });

            req.once('socket', (socket: Socket) => {
                let phase: TimeoutPhase = 'connect';
                arm = (next) => {
                    phase = next;
                    socket.setTimeout(budget[next]);
                };
                const onTimeout = () => req.destroy(new PhaseTimeoutError(phase, budget[phase]));

                socket.on('timeout', onTimeout);
                req.once('close', () => {
                    socket.setTimeout(0);
                    socket.removeListener('timeout', onTimeout);
                });

                if (socket.connecting) {
                    arm('connect');
                    socket.once('connect', () => arm(bodySent ? 'read' : 'write'));
                } else {
                    arm(bodySent ? 'read' : 'write');
                }
            });

            return req;
        },
    };
}
