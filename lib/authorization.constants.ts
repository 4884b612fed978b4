export const AUTHORIZATION_MODULE_OPTIONS = Symbol('authorization:module-options');
export const AUTHORIZATION_METADATA_KEY = 'authorization:endpoint-metadata';
