import ObjectHandle from '../objectHandle';
import { Variant, VariantMap } from '../variant';

/**
 * Owns the creation of script objects and is told about every parameter
 * change and method call made through {@link ObjectHandle}.
 */
export interface Context {
    makeShared(name: string, params: VariantMap): ObjectHandle;
    notifySetParameter(handle: ObjectHandle, name: string, value: Variant): void;
    notifyCallMethod(
        handle: ObjectHandle,
        name: string,
        params: VariantMap
    ): void;
    /** Registered class name of `handle`. */
    name(handle: ObjectHandle): string;
    isHeadNode(): boolean;
}
