import ObjectHandle from './objectHandle';

export type ObjectId = number;

export type Vector2d = [number, number];
export type Vector3d = [number, number, number];
export type Vector4d = [number, number, number, number];

export type None = {
    type: 'none';
};
export type Bool = {
    type: 'bool';
    value: boolean;
};
export type Int = {
    type: 'int';
    value: number;
};
export type Double = {
    type: 'double';
    value: number;
};
export type Str = {
    type: 'string';
    value: string;
};
export type IntVector = {
    type: 'int_vector';
    value: number[];
};
export type DoubleVector = {
    type: 'double_vector';
    value: number[];
};
export type Vector2 = {
    type: 'vector2d';
    value: Vector2d;
};
export type Vector3 = {
    type: 'vector3d';
    value: Vector3d;
};
export type Vector4 = {
    type: 'vector4d';
    value: Vector4d;
};

/**
 * Alternatives shared by live and packed values. They are copied as-is in
 * both directions.
 */
export type ScalarVariant =
    | None
    | Bool
    | Int
    | Double
    | Str
    | IntVector
    | DoubleVector
    | Vector2
    | Vector3
    | Vector4;

export type ObjectRef = {
    type: 'object';
    value: ObjectHandle;
};
export type ObjectIdRef = {
    type: 'object_id';
    value: ObjectId;
};

export type RecursiveList<TLeaf> = {
    type: 'list';
    value: Recursive<TLeaf>[];
};
export type Recursive<TLeaf> = TLeaf | RecursiveList<TLeaf>;

export type VariantLeaf = ScalarVariant | ObjectRef;
export type PackedLeaf = ScalarVariant | ObjectIdRef;

/** In-process value. May hold live object references. */
export type Variant = Recursive<VariantLeaf>;
export type VariantList = RecursiveList<VariantLeaf>;

/** Transmittable counterpart of {@link Variant}: objects appear by id only. */
export type PackedVariant = Recursive<PackedLeaf>;
export type PackedList = RecursiveList<PackedLeaf>;

export type VariantMap = Map<string, Variant>;
export type PackedMap = [string, PackedVariant][];

export type ObjectTable = Map<ObjectId, ObjectHandle>;

export default class Variants {
    static none(): None {
        return { type: 'none' };
    }

    static bool(value: boolean): Bool {
        return { type: 'bool', value };
    }

    static int(value: number): Int {
        if (!Number.isInteger(value)) {
            throw new Error(`Expected an integer but got ${value}`);
        }
        return { type: 'int', value };
    }

    static double(value: number): Double {
        return { type: 'double', value };
    }

    static string(value: string): Str {
        return { type: 'string', value };
    }

    static intVector(value: number[]): IntVector {
        return { type: 'int_vector', value };
    }

    static doubleVector(value: number[]): DoubleVector {
        return { type: 'double_vector', value };
    }

    static vector2d(value: Vector2d): Vector2 {
        return { type: 'vector2d', value };
    }

    static vector3d(value: Vector3d): Vector3 {
        return { type: 'vector3d', value };
    }

    static vector4d(value: Vector4d): Vector4 {
        return { type: 'vector4d', value };
    }

    static object(value: ObjectHandle): ObjectRef {
        return { type: 'object', value };
    }

    static list(value: Variant[]): VariantList {
        return { type: 'list', value };
    }
}

export function isList<TLeaf extends { type: string }>(
    value: Recursive<TLeaf>
): value is RecursiveList<TLeaf> {
    return value.type === 'list';
}

/**
 * Structural copy of a scalar alternative. Every scalar must have a case
 * here; the compiler rejects a missing one through the return type.
 */
export function copyScalar(value: ScalarVariant): ScalarVariant {
    switch (value.type) {
        case 'none':
            return { type: 'none' };
        case 'bool':
        case 'int':
        case 'double':
        case 'string':
            return { ...value };
        case 'int_vector':
        case 'double_vector':
            return { type: value.type, value: value.value.slice() };
        case 'vector2d':
            return { type: 'vector2d', value: [...value.value] };
        case 'vector3d':
            return { type: 'vector3d', value: [...value.value] };
        case 'vector4d':
            return { type: 'vector4d', value: [...value.value] };
    }
}

/**
 * Builds a {@link VariantMap} from ordered pairs. A repeated key is a caller
 * error and throws rather than silently overwriting the earlier entry.
 */
export function makeVariantMap(entries: [string, Variant][]): VariantMap {
    const map: VariantMap = new Map();
    for (const [key, value] of entries) {
        if (map.has(key)) {
            throw new Error(`Duplicate key "${key}"`);
        }
        map.set(key, value);
    }
    return map;
}

function typeError(expected: string, value: Variant): Error {
    return new Error(`Expected ${expected} but got ${value.type}`);
}

export function getValue(map: VariantMap, key: string): Variant {
    const value = map.get(key);
    if (value === undefined) {
        throw new Error(`Missing parameter "${key}"`);
    }
    return value;
}

export function expectBool(value: Variant): boolean {
    if (value.type !== 'bool') throw typeError('bool', value);
    return value.value;
}

export function expectInt(value: Variant): number {
    if (value.type !== 'int') throw typeError('int', value);
    return value.value;
}

export function expectDouble(value: Variant): number {
    if (value.type !== 'double' && value.type !== 'int') {
        throw typeError('double', value);
    }
    return value.value;
}

export function expectString(value: Variant): string {
    if (value.type !== 'string') throw typeError('string', value);
    return value.value;
}

export function expectIntVector(value: Variant): number[] {
    if (value.type !== 'int_vector') throw typeError('int_vector', value);
    return value.value;
}

export function expectDoubleVector(value: Variant): number[] {
    if (value.type !== 'double_vector') {
        throw typeError('double_vector', value);
    }
    return value.value;
}

export function expectVector3d(value: Variant): Vector3d {
    if (value.type !== 'vector3d') throw typeError('vector3d', value);
    return value.value;
}

export function expectObject(value: Variant): ObjectHandle {
    if (value.type !== 'object') throw typeError('object', value);
    return value.value;
}

export function expectList(value: Variant): Variant[] {
    if (value.type !== 'list') throw typeError('list', value);
    return value.value;
}
