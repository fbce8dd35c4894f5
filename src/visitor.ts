import { isList, Recursive, RecursiveList } from './variant';

export type LeafTransform<TFrom, TTo> = (value: TFrom) => Recursive<TTo>;

/**
 * Rebuilds a recursive value bottom-up. Lists are mapped element by element
 * in order; every other alternative goes through `leaf`. Adding an
 * alternative to either side only ever concerns `leaf`.
 */
export function recursiveTransform<
    TFrom extends { type: string },
    TTo extends { type: string }
>(value: Recursive<TFrom>, leaf: LeafTransform<TFrom, TTo>): Recursive<TTo> {
    if (isList(value)) {
        const list: RecursiveList<TTo> = {
            type: 'list',
            value: value.value.map((element) =>
                recursiveTransform(element, leaf)
            ),
        };
        return list;
    }
    return leaf(value);
}
