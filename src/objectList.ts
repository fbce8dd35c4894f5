import ObjectHandle from './objectHandle';
import Variants, {
    expectList,
    expectObject,
    getValue,
    Variant,
    VariantMap,
} from './variant';

/** Ordered collection of references to other script objects. */
export default class ObjectList extends ObjectHandle {
    private elements: ObjectHandle[] = [];

    construct(params: VariantMap): void {
        for (const name of params.keys()) {
            if (name !== 'objects') {
                throw new Error(`Unknown parameter "${name}"`);
            }
        }
        const objects = params.get('objects');
        if (objects === undefined) return;
        for (const element of expectList(objects)) {
            this.elements.push(expectObject(element));
        }
    }

    doCallMethod(name: string, params: VariantMap): Variant {
        switch (name) {
            case 'add':
                this.elements.push(expectObject(getValue(params, 'object')));
                return Variants.none();
            case 'remove': {
                const object = expectObject(getValue(params, 'object'));
                const idx = this.elements.indexOf(object);
                if (idx === -1) {
                    throw new Error('Object is not in the list');
                }
                this.elements.splice(idx, 1);
                return Variants.none();
            }
            case 'get_elements':
                return Variants.list(
                    this.elements.map((element) => Variants.object(element))
                );
            case 'size':
                return Variants.int(this.elements.length);
            case 'clear':
                this.elements = [];
                return Variants.none();
        }
        return super.doCallMethod(name, params);
    }
}
