export * from './engine/potree/types';
export * from './engine/potree/errors';
export * from './engine/potree/JsonAccessor';
export * from './engine/potree/SchemaResolver';
export * from './engine/potree/attributeDecoders';
export * from './engine/potree/ByteSource';
export * from './engine/potree/RecordDecoder';
export * from './engine/potree/PointBlockGeometry';
export * from './engine/potree/PointBlockStore';
export * from './engine/potree/PotreeLoader';
export { appStore, type AppState } from './state/appStore';
export * from './state/slices';
