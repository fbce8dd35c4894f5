import Factory from '../factory';
import ObjectHandle from '../objectHandle';
import { VariantMap } from '../variant';
import { Context } from './context';

/** Single-process context: objects live here and nowhere else. */
export default class LocalContext implements Context {
    constructor(private factory: Factory) {}

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
        return true;
    }
}
