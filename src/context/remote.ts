import YNEvents from '@yesness/events';
import { IYNSocket } from '@yesness/socket';
import Factory from '../factory';
import { Message } from '../internalTypes';
import ObjectHandle from '../objectHandle';
import { unpack, UnknownReferenceError } from '../packedVariant';
import { ContextOptions } from '../types';
import { handleSocket } from '../util';
import { parseMessage } from '../validators';
import { ObjectId, ObjectTable, VariantMap } from '../variant';
import { Context } from './context';

type ProtocolErrorListener = (error: Error) => void;

export interface IRemoteContext extends Context {
    on(event: 'protocol_error', listener: ProtocolErrorListener): this;
}

/**
 * Context of a compute process. Applies what the coordinating process
 * broadcasts, resolving object ids through a table from the coordinator's ids
 * to the local mirrors.
 */
export default class RemoteContext extends YNEvents implements IRemoteContext {
    private debugLogging: boolean;
    private factory: Factory;
    private localObjects: ObjectTable = new Map();

    constructor(
        socket: IYNSocket,
        options: ContextOptions & { factory: Factory }
    ) {
        super();
        this.factory = options.factory;
        this.debugLogging = options.debugLogging ?? false;
        handleSocket<never>(socket, {
            onJSON: (json) => this.onMessage(parseMessage(json)),
            onError: (error) => this.emit('protocol_error', error),
        });
    }

    get objectCount(): number {
        return this.localObjects.size;
    }

    getObject(objectID: ObjectId): ObjectHandle {
        const handle = this.localObjects.get(objectID);
        if (handle === undefined) {
            throw new UnknownReferenceError(objectID);
        }
        return handle;
    }

    /** Objects made here directly stay local to this process. */
    makeShared(name: string, params: VariantMap): ObjectHandle {
        const handle = this.factory.make(name);
        handle.attach(this);
        handle.construct(params);
        return handle;
    }

    notifySetParameter(): void {}

    notifyCallMethod(): void {}

    name(handle: ObjectHandle): string {
        return this.factory.typeName(handle);
    }

    isHeadNode(): boolean {
        return false;
    }

    private onMessage(msg: Message) {
        if (this.debugLogging) {
            console.debug('[NODE] onMessage', JSON.stringify(msg, null, 2));
        }
        switch (msg.type) {
            case 'create': {
                if (this.localObjects.has(msg.objectID)) {
                    throw new Error(`Object ${msg.objectID} already exists`);
                }
                const handle = this.makeShared(
                    msg.name,
                    unpack(msg.params, this.localObjects)
                );
                this.localObjects.set(msg.objectID, handle);
                break;
            }
            case 'set_parameter':
                this.getObject(msg.objectID).doSetParameter(
                    msg.name,
                    unpack(msg.value, this.localObjects)
                );
                break;
            case 'call_method':
                this.getObject(msg.objectID).doCallMethod(
                    msg.name,
                    unpack(msg.params, this.localObjects)
                );
                break;
            case 'delete':
                this.localObjects.delete(msg.objectID);
                break;
        }
    }
}
