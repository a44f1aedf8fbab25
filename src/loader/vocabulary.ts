export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';

export const RDF_TYPE = `${RDF_NS}type`;
export const RDFS_CLASS = `${RDFS_NS}Class`;
export const RDFS_SUBCLASS_OF = `${RDFS_NS}subClassOf`;

export const OWL_ONTOLOGY = `${OWL_NS}Ontology`;
export const OWL_CLASS = `${OWL_NS}Class`;
export const OWL_THING = `${OWL_NS}Thing`;
export const OWL_IMPORTS = `${OWL_NS}imports`;
export const OWL_RESTRICTION = `${OWL_NS}Restriction`;
export const OWL_ON_PROPERTY = `${OWL_NS}onProperty`;
