import { ObjectId, PackedMap, PackedVariant } from './variant';

export type MessageCreate = {
    type: 'create';
    objectID: ObjectId;
    name: string;
    params: PackedMap;
};

export type MessageSetParameter = {
    type: 'set_parameter';
    objectID: ObjectId;
    name: string;
    value: PackedVariant;
};

export type MessageCallMethod = {
    type: 'call_method';
    objectID: ObjectId;
    name: string;
    params: PackedMap;
};

export type MessageDelete = {
    type: 'delete';
    objectID: ObjectId;
};

export type Message =
    | MessageCreate
    | MessageSetParameter
    | MessageCallMethod
    | MessageDelete;
