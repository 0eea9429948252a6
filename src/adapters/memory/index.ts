export { InMemoryRelationshipStore } from './relationship-store.js'
export { InMemoryMappingStore } from './mapping-store.js'
