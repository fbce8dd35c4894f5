import Factory from './factory';

export type ContextOptions = {
    factory?: Factory; // default: a factory with the built-in classes
    debugLogging?: boolean; // default: false
};
