/**
 * Domain value objects - exports all value objects
 */

export * from './DisabledMarker';
export * from './Result';
export * from './RpcFailure';
