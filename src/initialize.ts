import Factory from './factory';
import ObjectList from './objectList';

export default function initialize(factory: Factory): void {
    factory.registerNew('ObjectList', ObjectList);
}
