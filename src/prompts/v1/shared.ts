export const PROMPT_VERSION = "v1";

export const NO_CHARACTERS_PLACEHOLDER = "Create new characters as needed";
