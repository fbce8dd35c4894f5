import ObjectHandle from './objectHandle';

export type HandleClass = new () => ObjectHandle;

/** Creates script objects by their registered class name. */
export default class Factory {
    private classes: Map<string, HandleClass> = new Map();
    private names: Map<Function, string> = new Map();

    registerNew(name: string, handleClass: HandleClass): void {
        if (this.classes.has(name)) {
            throw new Error(`Class name "${name}" is already registered`);
        }
        this.classes.set(name, handleClass);
        this.names.set(handleClass, name);
    }

    has(name: string): boolean {
        return this.classes.has(name);
    }

    make(name: string): ObjectHandle {
        const handleClass = this.classes.get(name);
        if (handleClass === undefined) {
            throw new Error(`Unknown class name "${name}"`);
        }
        return new handleClass();
    }

    typeName(handle: ObjectHandle): string {
        const name = this.names.get(handle.constructor);
        if (name === undefined) {
            throw new Error(
                `Class ${handle.constructor.name} is not registered`
            );
        }
        return name;
    }
}
