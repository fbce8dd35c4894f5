import ObjectHandle from './objectHandle';
import Tracker from './tracker';
import {
    copyScalar,
    ObjectId,
    ObjectTable,
    PackedLeaf,
    PackedMap,
    PackedVariant,
    Variant,
    VariantLeaf,
    VariantMap,
} from './variant';
import { recursiveTransform } from './visitor';

export type PackResult<T> = {
    packed: T;
    /** One entry per distinct object referenced anywhere in `packed`. */
    objects: ObjectTable;
};

export class UnknownReferenceError extends Error {
    constructor(public readonly objectID: ObjectId) {
        super(`Unknown object reference: ${objectID}`);
        this.name = 'UnknownReferenceError';
    }
}

function packValue(value: Variant, objects: ObjectTable): PackedVariant {
    return recursiveTransform<VariantLeaf, PackedLeaf>(value, (leaf) => {
        if (leaf.type !== 'object') {
            return copyScalar(leaf);
        }
        const objectID = Tracker.objectId(leaf.value);
        if (!objects.has(objectID)) {
            objects.set(objectID, leaf.value);
        }
        return { type: 'object_id', value: objectID };
    });
}

function unpackValue(
    value: PackedVariant,
    objects: ReadonlyMap<ObjectId, ObjectHandle>
): Variant {
    return recursiveTransform<PackedLeaf, VariantLeaf>(value, (leaf) => {
        if (leaf.type !== 'object_id') {
            return copyScalar(leaf);
        }
        const object = objects.get(leaf.value);
        if (object === undefined) {
            throw new UnknownReferenceError(leaf.value);
        }
        return { type: 'object', value: object };
    });
}

/**
 * Replaces every object reference by its id. The returned table resolves
 * those ids back to the objects and must outlive any transport step that
 * relies on it.
 */
export function pack(value: Variant): PackResult<PackedVariant>;
export function pack(map: VariantMap): PackResult<PackedMap>;
export function pack(
    value: Variant | VariantMap
): PackResult<PackedVariant> | PackResult<PackedMap> {
    const objects: ObjectTable = new Map();
    if (value instanceof Map) {
        const packed = Array.from(
            value,
            ([key, entry]): [string, PackedVariant] => [
                key,
                packValue(entry, objects),
            ]
        );
        return { packed, objects };
    }
    return { packed: packValue(value, objects), objects };
}

/**
 * Resolves every id through `objects`. Throws {@link UnknownReferenceError}
 * for an id the table does not know; nothing is returned in that case.
 */
export function unpack(
    value: PackedVariant,
    objects: ReadonlyMap<ObjectId, ObjectHandle>
): Variant;
export function unpack(
    map: PackedMap,
    objects: ReadonlyMap<ObjectId, ObjectHandle>
): VariantMap;
export function unpack(
    value: PackedVariant | PackedMap,
    objects: ReadonlyMap<ObjectId, ObjectHandle>
): Variant | VariantMap {
    if (Array.isArray(value)) {
        return new Map(
            value.map(([key, entry]): [string, Variant] => [
                key,
                unpackValue(entry, objects),
            ])
        );
    }
    return unpackValue(value, objects);
}
