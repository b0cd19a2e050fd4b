// Sparse-array marker for "no dense slot"
export const EMPTY = -1;

// Initial capacity of the slot table and of every pool's sparse array
// (user can override via RegistryOptions.initial_capacity)
export const DEFAULT_INITIAL_CAPACITY = 64;
export const GROWTH_FACTOR = 2;

// Entity generation
export const INITIAL_GENERATION = 0;

// Returned by bindings for absent numeric values
export const DEFAULT_NUMBER = 0;
