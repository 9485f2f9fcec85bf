export * from './stage.types';
export * from './render.stage';
export * from './merge.stage';
export * from './format.stage';
export * from './rasterize.stage';
export * from './stages.module';
