export * from './render.node';
export * from './merge.node';
export * from './convert-format.node';
export * from './rasterize.node';
export * from './finalize.node';
