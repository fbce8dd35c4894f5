import { IYNSocket } from '@yesness/socket';
import Factory from '../factory';
import { Message } from '../internalTypes';
import ObjectHandle from '../objectHandle';
import { pack } from '../packedVariant';
import Tracker from '../tracker';
import { ContextOptions } from '../types';
import { handleSocket, SocketSend } from '../util';
import { ObjectId, ObjectTable, Variant, VariantMap } from '../variant';
import { Context } from './context';

class ComputeNode {
    send: SocketSend<Message>;

    constructor(private head: GlobalContext, socket: IYNSocket) {
        this.send = handleSocket<Message>(socket, {
            onJSON: (json) => {
                if (this.head.debugLogging) {
                    console.debug('[HEAD] ignored', JSON.stringify(json));
                }
            },
            onClose: () => this.head.onDisconnect(this),
        });
    }
}

/**
 * Context of the coordinating process. Every object created here is mirrored
 * on each connected compute process, and every parameter change or method
 * call is replayed there.
 */
export default class GlobalContext implements Context {
    debugLogging: boolean;
    nodes: ComputeNode[] = [];
    private factory: Factory;
    private created = false;
    private finalizer: FinalizationRegistry<ObjectId>;

    constructor(options: ContextOptions & { factory: Factory }) {
        this.factory = options.factory;
        this.debugLogging = options.debugLogging ?? false;
        this.finalizer = new FinalizationRegistry((objectID) =>
            this.onReclaimed(objectID)
        );
    }

    connect(socket: IYNSocket): void {
        if (this.created) {
            throw new Error(
                'Compute nodes must connect before objects are created'
            );
        }
        this.nodes.push(new ComputeNode(this, socket));
    }

    onDisconnect(node: ComputeNode) {
        const idx = this.nodes.indexOf(node);
        if (idx === -1) {
            throw new Error('Node disconnected but was not tracked');
        }
        this.nodes.splice(idx, 1);
    }

    /** Called once the runtime has reclaimed the object behind `objectID`. */
    onReclaimed(objectID: ObjectId) {
        this.broadcast({ type: 'delete', objectID });
    }

    makeShared(name: string, params: VariantMap): ObjectHandle {
        const handle = this.factory.make(name);
        handle.attach(this);
        handle.construct(params);
        const { packed, objects } = pack(params);
        this.assertManaged(objects);
        const objectID = Tracker.objectId(handle);
        this.created = true;
        this.broadcast({ type: 'create', objectID, name, params: packed });
        this.finalizer.register(handle, objectID);
        return handle;
    }

    notifySetParameter(
        handle: ObjectHandle,
        name: string,
        value: Variant
    ): void {
        const { packed, objects } = pack(value);
        this.assertManaged(objects);
        this.broadcast({
            type: 'set_parameter',
            objectID: Tracker.objectId(handle),
            name,
            value: packed,
        });
    }

    notifyCallMethod(
        handle: ObjectHandle,
        name: string,
        params: VariantMap
    ): void {
        const { packed, objects } = pack(params);
        this.assertManaged(objects);
        this.broadcast({
            type: 'call_method',
            objectID: Tracker.objectId(handle),
            name,
            params: packed,
        });
    }

    name(handle: ObjectHandle): string {
        return this.factory.typeName(handle);
    }

    isHeadNode(): boolean {
        return true;
    }

    // Compute nodes resolve ids only for objects this context announced.
    private assertManaged(objects: ObjectTable) {
        for (const [objectID, handle] of objects) {
            if (handle.getContext() !== this) {
                throw new Error(
                    `Object ${objectID} is not managed by this context`
                );
            }
        }
    }

    private broadcast(msg: Message) {
        if (this.debugLogging) {
            console.debug('[HEAD] broadcast', JSON.stringify(msg, null, 2));
        }
        for (const node of this.nodes) {
            node.send(msg);
        }
    }
}
