import { ObjectId } from './variant';

/**
 * Hands out process-local object ids. An id is assigned the first time an
 * object is seen and stays with that object for the rest of the process;
 * the association is held weakly so it never keeps the object alive.
 */
export default class Tracker {
    private static ids = new WeakMap<object, ObjectId>();
    private static nextID: ObjectId = 1;

    static objectId(object: object): ObjectId {
        const existing = Tracker.ids.get(object);
        if (existing !== undefined) {
            return existing;
        }
        const objectID = Tracker.nextID++;
        Tracker.ids.set(object, objectID);
        return objectID;
    }
}
