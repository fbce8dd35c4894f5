import YNEvents from '@yesness/events';
import { IYNSocket } from '@yesness/socket';

class PairSocket extends YNEvents implements IYNSocket {
    peer: PairSocket | null = null;
    private closed = false;

    send(data: Buffer | string) {
        if (this.closed) {
            throw new Error('Socket is closed');
        }
        this.peer?.emit(
            'data',
            typeof data === 'string' ? Buffer.from(data, 'utf-8') : data
        );
    }

    close() {
        if (this.closed) return;
        this.closed = true;
        this.emit('close');
        this.peer?.close();
    }
}

/**
 * Two in-process sockets wired to each other. Sending on one emits `data` on
 * the other before `send` returns; closing either closes both.
 */
export default function socketPair(): [IYNSocket, IYNSocket] {
    const a = new PairSocket();
    const b = new PairSocket();
    a.peer = b;
    b.peer = a;
    return [a, b];
}
