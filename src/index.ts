import { IYNSocket } from '@yesness/socket';
import GlobalContext from './context/global';
import LocalContext from './context/local';
import RemoteContext from './context/remote';
import Factory from './factory';
import initialize from './initialize';
import { ContextOptions } from './types';

export { Context } from './context/context';
export { GlobalContext, LocalContext, RemoteContext, Factory, initialize };
export { default as ObjectHandle, AutoParameter } from './objectHandle';
export { default as ObjectList } from './objectList';
export { default as Tracker } from './tracker';
export { default as socketPair } from './socketPair';
export { pack, unpack, PackResult, UnknownReferenceError } from './packedVariant';
export { recursiveTransform, LeafTransform } from './visitor';
export { isPackedVariant, isPackedMap, parseMessage } from './validators';
export { Message } from './internalTypes';
export * from './variant';
export { default as Variants } from './variant';
export { ContextOptions };

export default class ScriptBridge {
    static createFactory(): Factory {
        const factory = new Factory();
        initialize(factory);
        return factory;
    }

    static createLocalContext(factory?: Factory): LocalContext {
        return new LocalContext(factory ?? ScriptBridge.createFactory());
    }

    static createGlobalContext(options?: ContextOptions): GlobalContext {
        return new GlobalContext({
            ...options,
            factory: options?.factory ?? ScriptBridge.createFactory(),
        });
    }

    static createRemoteContext(
        socket: IYNSocket,
        options?: ContextOptions
    ): RemoteContext {
        return new RemoteContext(socket, {
            ...options,
            factory: options?.factory ?? ScriptBridge.createFactory(),
        });
    }
}
