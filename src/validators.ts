import { Message } from './internalTypes';
import { PackedMap, PackedVariant } from './variant';

/**
 * Type guards for values decoded from the wire. Anything that reaches the
 * pack engine from a socket goes through these first.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isNumberArray(value: unknown, length?: number): value is number[] {
    return (
        Array.isArray(value) &&
        (length === undefined || value.length === length) &&
        value.every(isFiniteNumber)
    );
}

function isObjectId(value: unknown): value is number {
    return Number.isInteger(value);
}

export function isPackedVariant(value: unknown): value is PackedVariant {
    if (!isRecord(value)) return false;
    const inner = value.value;
    switch (value.type) {
        case 'none':
            return true;
        case 'bool':
            return typeof inner === 'boolean';
        case 'int':
            return Number.isInteger(inner);
        case 'double':
            return isFiniteNumber(inner);
        case 'string':
            return typeof inner === 'string';
        case 'int_vector':
            return isNumberArray(inner) && inner.every(Number.isInteger);
        case 'double_vector':
            return isNumberArray(inner);
        case 'vector2d':
            return isNumberArray(inner, 2);
        case 'vector3d':
            return isNumberArray(inner, 3);
        case 'vector4d':
            return isNumberArray(inner, 4);
        case 'object_id':
            return isObjectId(inner);
        case 'list':
            return Array.isArray(inner) && inner.every(isPackedVariant);
        default:
            return false;
    }
}

export function isPackedMap(value: unknown): value is PackedMap {
    if (!Array.isArray(value)) return false;
    const keys = new Set<string>();
    for (const entry of value) {
        if (
            !Array.isArray(entry) ||
            entry.length !== 2 ||
            typeof entry[0] !== 'string' ||
            keys.has(entry[0]) ||
            !isPackedVariant(entry[1])
        ) {
            return false;
        }
        keys.add(entry[0]);
    }
    return true;
}

function malformed(reason: string): Error {
    return new Error(`Malformed message: ${reason}`);
}

export function parseMessage(json: unknown): Message {
    if (!isRecord(json)) {
        throw malformed('expected an object');
    }
    const { type, objectID, name } = json;
    if (!isObjectId(objectID)) {
        throw malformed('missing objectID');
    }
    if (type === 'create' || type === 'call_method') {
        if (typeof name !== 'string') throw malformed('missing name');
        if (!isPackedMap(json.params)) throw malformed('invalid params');
        return { type, objectID, name, params: json.params };
    }
    if (type === 'set_parameter') {
        if (typeof name !== 'string') throw malformed('missing name');
        if (!isPackedVariant(json.value)) throw malformed('invalid value');
        return { type, objectID, name, value: json.value };
    }
    if (type === 'delete') {
        return { type, objectID };
    }
    throw malformed(`unknown type "${String(type)}"`);
}
