// Standalone, static paths (no dynamic parameters)
export const PROFILES_SUFFIX = '/profiles'; // Path for listing available parser profiles

// Prefixes for routes that include a dynamic :profileId
export const PROFILE_CONFIG_ENDPOINT_PREFIX = '/config'; // e.g., /api/messages/config/:profileId
export const PROFILE_PARSE_ENDPOINT_PREFIX = '/parse'; // e.g., /api/messages/parse/:profileId
