export { NodeCollection, type NodeCollectionOptions } from './collection.js';
