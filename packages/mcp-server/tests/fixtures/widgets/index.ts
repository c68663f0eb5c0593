import { Registry } from './registry';

const registry = new Registry();
registry.register('widget');
