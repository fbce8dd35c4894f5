import { IYNSocket } from '@yesness/socket';

export type SocketSend<T> = (json: T) => void;

const NEWLINE = 0x0a;

function toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
}

/**
 * Newline-delimited JSON over `socket`. Each complete line is parsed and
 * handed to `onJSON`; the first failure closes the socket and stops further
 * delivery.
 */
export function handleSocket<TSend>(
    socket: IYNSocket,
    callbacks: {
        onJSON: (json: unknown) => void;
        onClose?: () => void;
        onError?: (error: Error) => void;
    }
): SocketSend<TSend> {
    let closed = false;
    // Raw bytes: a multi-byte character may be split across chunks.
    let buffer: Buffer = Buffer.alloc(0);
    socket.on('data', (data) => {
        if (closed) return;
        try {
            const chunk = Buffer.isBuffer(data)
                ? data
                : Buffer.from(String(data), 'utf-8');
            buffer = Buffer.concat([buffer, chunk]);
            let end: number;
            while ((end = buffer.indexOf(NEWLINE)) !== -1) {
                const line = buffer.subarray(0, end).toString('utf-8');
                buffer = buffer.subarray(end + 1);
                let json: unknown;
                try {
                    json = JSON.parse(line);
                } catch (e) {
                    throw new Error(
                        `JSON error when parsing line "${line}": ${
                            toError(e).message
                        }`
                    );
                }
                callbacks.onJSON(json);
            }
        } catch (e) {
            closed = true;
            const error = toError(e);
            console.error('Socket error', error);
            callbacks.onError?.(error);
            socket.close();
        }
    });
    socket.on('close', () => {
        closed = true;
        callbacks.onClose?.();
    });
    return (json) => {
        socket.send(`${JSON.stringify(json)}\n`);
    };
}
