export const ASSOCIATION_METHODS = new Set(['belongs_to', 'has_one', 'has_many']);

export const FACTORY_BOT_METHODS = new Set([
  'attributes_for',
  'attributes_for_list',
  'build',
  'build_list',
  'build_pair',
  'build_stubbed',
  'build_stubbed_list',
  'create',
  'create_list',
  'create_pair',
]);

export const FACTORY_DEFINITION_METHOD = 'factory';

// Calls whose arguments the tree builder parses into nodes.
export const ARGUMENT_CALLS = new Set([
  ...ASSOCIATION_METHODS,
  ...FACTORY_BOT_METHODS,
  FACTORY_DEFINITION_METHOD,
]);
