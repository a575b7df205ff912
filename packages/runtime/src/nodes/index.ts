// Node variants and their registry

export {
  defineVariant,
  type GeometryNode,
  type NodeClass,
  type NodeVariant,
  type VariantDefinition,
} from './variant.js';

export { generateId } from './ids.js';
export { Point3, point3Variant } from './point.js';
export { Rectangle, rectangleVariant } from './rectangle.js';

export {
  createVariantRegistry,
  coreVariants,
  coreVariantRegistry,
  type VariantRegistry,
} from './registry.js';
