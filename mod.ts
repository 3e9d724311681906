// stylebox library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Element tree and document
export * from './src/types.ts';
export * from './src/element.ts';
export * from './src/document.ts';
export * from './src/markup.ts';

// Values and properties
export * from './src/values.ts';
export * from './src/color.ts';
export * from './src/properties.ts';

// Stylesheets, selectors and the cascade
export * from './src/stylesheet.ts';
export * from './src/selector.ts';
export * from './src/user-agent.ts';
export * from './src/cascade.ts';

// Box model, text metrics and layout
export * from './src/sizing.ts';
export * from './src/text-measure.ts';
export * from './src/layout.ts';
export * from './src/layout-tree.ts';

// Queries over the published tree
export {
  pointInBounds,
  containsBounds,
  translateBounds,
  insetBounds,
  clipBounds,
  boundsIntersect,
  type Point,
} from './src/geometry.ts';
export * from './src/hit-test.ts';
export * from './src/debug.ts';

// Reflow
export * from './src/reflow.ts';

// Errors, logging and configuration
export * from './src/errors.ts';
export * from './src/logging.ts';
export * from './src/env.ts';
export * from './src/config/mod.ts';
