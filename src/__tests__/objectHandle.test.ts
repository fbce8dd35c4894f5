import LocalContext from '../context/local';
import Factory from '../factory';
import initialize from '../initialize';
import ObjectHandle from '../objectHandle';
import Variants, {
    expectDouble,
    expectList,
    expectObject,
    expectVector3d,
    getValue,
    makeVariantMap,
    Variant,
    VariantMap,
    Vector3d,
} from '../variant';

class Sphere extends ObjectHandle {
    radius = 1;
    center: Vector3d = [0, 0, 0];

    constructor() {
        super();
        this.addParameters([
            {
                name: 'radius',
                getter: () => Variants.double(this.radius),
                setter: (value) => {
                    this.radius = expectDouble(value);
                },
            },
            {
                name: 'center',
                getter: () => Variants.vector3d(this.center),
                setter: (value) => {
                    this.center = expectVector3d(value);
                },
            },
            {
                name: 'diameter',
                getter: () => Variants.double(2 * this.radius),
            },
        ]);
    }

    doCallMethod(name: string, params: VariantMap): Variant {
        if (name === 'scale') {
            this.radius *= expectDouble(getValue(params, 'factor'));
            return Variants.double(this.radius);
        }
        return super.doCallMethod(name, params);
    }
}

class Twice extends ObjectHandle {
    constructor() {
        super();
        const param = { name: 'x', getter: () => Variants.none() };
        this.addParameters([param, param]);
    }
}

function getContext(): LocalContext {
    const factory = new Factory();
    initialize(factory);
    factory.registerNew('Sphere', Sphere);
    return new LocalContext(factory);
}

describe('ObjectHandle', () => {
    test('parameters keep declaration order', () => {
        const sphere = new Sphere();
        expect(sphere.validParameters()).toEqual([
            'radius',
            'center',
            'diameter',
        ]);
        expect(Array.from(sphere.getParameters())).toEqual([
            ['radius', Variants.double(1)],
            ['center', Variants.vector3d([0, 0, 0])],
            ['diameter', Variants.double(2)],
        ]);
    });

    test('set and get parameters', () => {
        const sphere = new Sphere();
        sphere.setParameter('radius', Variants.int(3));
        expect(sphere.getParameter('radius')).toEqual(Variants.double(3));
        expect(sphere.getParameter('diameter')).toEqual(Variants.double(6));
    });

    test('parameter errors', () => {
        const sphere = new Sphere();
        expect(() => sphere.getParameter('mass')).toThrow(
            'Unknown parameter "mass"'
        );
        expect(() =>
            sphere.setParameter('diameter', Variants.double(1))
        ).toThrow('Parameter "diameter" is read-only');
        expect(() =>
            sphere.setParameter('radius', Variants.string('big'))
        ).toThrow('Expected double but got string');
        expect(() => new Twice()).toThrow('Parameter "x" is already declared');
    });

    test('construct applies parameters', () => {
        const context = getContext();
        const sphere = context.makeShared(
            'Sphere',
            makeVariantMap([
                ['radius', Variants.double(2)],
                ['center', Variants.vector3d([1, 2, 3])],
            ])
        );
        expect(sphere).toBeInstanceOf(Sphere);
        expect(sphere.getContext()).toBe(context);
        expect(sphere.name()).toBe('Sphere');
        expect(sphere.getParameter('center')).toEqual(
            Variants.vector3d([1, 2, 3])
        );
        expect(sphere.getParameter('radius')).toEqual(Variants.double(2));
    });

    test('construct rejects unknown parameters', () => {
        const context = getContext();
        expect(() =>
            context.makeShared(
                'Sphere',
                makeVariantMap([['colour', Variants.string('red')]])
            )
        ).toThrow('Unknown parameter "colour"');
    });

    test('call methods', () => {
        const sphere = getContext().makeShared(
            'Sphere',
            makeVariantMap([['radius', Variants.double(2)]])
        );
        expect(
            sphere.callMethod(
                'scale',
                makeVariantMap([['factor', Variants.int(3)]])
            )
        ).toEqual(Variants.double(6));
        expect(() => sphere.callMethod('explode', new Map())).toThrow(
            'Unknown method "explode"'
        );
        expect(() => sphere.callMethod('scale', new Map())).toThrow(
            'Missing parameter "factor"'
        );
    });

    test('an object belongs to one context', () => {
        const sphere = getContext().makeShared('Sphere', new Map());
        expect(() => sphere.attach(getContext())).toThrow(
            'Object is already attached to a context'
        );
        expect(new Sphere().name()).toBeNull();
    });
});

describe('Factory', () => {
    test('make by name', () => {
        const factory = new Factory();
        factory.registerNew('Sphere', Sphere);
        expect(factory.has('Sphere')).toBe(true);
        expect(factory.has('Cube')).toBe(false);
        const sphere = factory.make('Sphere');
        expect(sphere).toBeInstanceOf(Sphere);
        expect(factory.typeName(sphere)).toBe('Sphere');
    });

    test('errors', () => {
        const factory = new Factory();
        factory.registerNew('Sphere', Sphere);
        expect(() => factory.registerNew('Sphere', Sphere)).toThrow(
            'Class name "Sphere" is already registered'
        );
        expect(() => factory.make('Cube')).toThrow(
            'Unknown class name "Cube"'
        );
        expect(() => new Factory().typeName(new Sphere())).toThrow(
            'Class Sphere is not registered'
        );
    });
});

describe('ObjectList', () => {
    test('holds references', () => {
        const context = getContext();
        const a = context.makeShared('Sphere', new Map());
        const b = context.makeShared('Sphere', new Map());
        const list = context.makeShared(
            'ObjectList',
            makeVariantMap([
                ['objects', Variants.list([Variants.object(a)])],
            ])
        );
        list.callMethod('add', makeVariantMap([['object', Variants.object(b)]]));
        list.callMethod('add', makeVariantMap([['object', Variants.object(a)]]));
        expect(list.callMethod('size', new Map())).toEqual(Variants.int(3));

        const elements = expectList(list.callMethod('get_elements', new Map()));
        expect(elements.map(expectObject)).toEqual([a, b, a]);
        expect(expectObject(elements[0])).toBe(a);
        expect(expectObject(elements[1])).toBe(b);

        list.callMethod(
            'remove',
            makeVariantMap([['object', Variants.object(a)]])
        );
        expect(
            expectList(list.callMethod('get_elements', new Map())).map(
                expectObject
            )
        ).toEqual([b, a]);

        list.callMethod('clear', new Map());
        expect(list.callMethod('size', new Map())).toEqual(Variants.int(0));
        expect(() =>
            list.callMethod(
                'remove',
                makeVariantMap([['object', Variants.object(a)]])
            )
        ).toThrow('Object is not in the list');
    });

    test('rejects unknown construction parameters', () => {
        const context = getContext();
        const sphere = context.makeShared('Sphere', new Map());
        expect(() =>
            context.makeShared(
                'ObjectList',
                makeVariantMap([
                    ['objcts', Variants.list([Variants.object(sphere)])],
                ])
            )
        ).toThrow('Unknown parameter "objcts"');
    });
});
