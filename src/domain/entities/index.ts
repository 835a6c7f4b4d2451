/**
 * Domain entities - exports all entities
 */

export * from './Torrent';
export * from './ServiceSettings';
