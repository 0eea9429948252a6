export { Ontology } from './ontology.js'
export {
  loadOntology,
  loadDefaultOntology,
  parseOntologyDefinition,
  DEFAULT_ONTOLOGY_PATH,
} from './loader.js'
export type { OntologyEntity, OntologyDefinition } from './types.js'
