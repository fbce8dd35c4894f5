import { Context } from './context/context';
import { Variant, VariantMap } from './variant';

export type AutoParameter = {
    name: string;
    getter: () => Variant;
    setter?: (value: Variant) => void; // absent: read-only
};

/**
 * Base class of every stateful script object. Parameters are declared by
 * subclasses with {@link ObjectHandle.addParameters}; methods are provided by
 * overriding {@link ObjectHandle.doCallMethod}.
 *
 * The `do*` methods act on this instance only. The public `setParameter` and
 * `callMethod` also tell the owning context once the local call has
 * succeeded, which is how a change made on the coordinating process reaches
 * the compute processes.
 */
export default abstract class ObjectHandle {
    private context: Context | null = null;
    private parameters: Map<string, AutoParameter> = new Map();

    attach(context: Context) {
        if (this.context !== null) {
            throw new Error('Object is already attached to a context');
        }
        this.context = context;
    }

    getContext(): Context | null {
        return this.context;
    }

    name(): string | null {
        return this.context?.name(this) ?? null;
    }

    protected addParameters(params: AutoParameter[]) {
        for (const param of params) {
            if (this.parameters.has(param.name)) {
                throw new Error(
                    `Parameter "${param.name}" is already declared`
                );
            }
            this.parameters.set(param.name, param);
        }
    }

    validParameters(): string[] {
        return Array.from(this.parameters.keys());
    }

    getParameter(name: string): Variant {
        return this.getAutoParameter(name).getter();
    }

    getParameters(): VariantMap {
        const map: VariantMap = new Map();
        for (const [name, param] of this.parameters) {
            map.set(name, param.getter());
        }
        return map;
    }

    setParameter(name: string, value: Variant): void {
        this.doSetParameter(name, value);
        this.context?.notifySetParameter(this, name, value);
    }

    doSetParameter(name: string, value: Variant): void {
        const { setter } = this.getAutoParameter(name);
        if (setter === undefined) {
            throw new Error(`Parameter "${name}" is read-only`);
        }
        setter(value);
    }

    /** Runs once, right after a context has created the object. */
    construct(params: VariantMap): void {
        for (const [name, value] of params) {
            this.doSetParameter(name, value);
        }
    }

    callMethod(name: string, params: VariantMap): Variant {
        const result = this.doCallMethod(name, params);
        this.context?.notifyCallMethod(this, name, params);
        return result;
    }

    doCallMethod(name: string, params: VariantMap): Variant {
        throw new Error(`Unknown method "${name}"`);
    }

    private getAutoParameter(name: string): AutoParameter {
        const param = this.parameters.get(name);
        if (param === undefined) {
            throw new Error(`Unknown parameter "${name}"`);
        }
        return param;
    }
}
