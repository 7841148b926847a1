/**
 * Key of the static factories that wrap text already proven valid.
 *
 * Shared between the value classes in `core/` and never re-exported from the
 * package entry point, so consumers can only obtain values through parsing.
 */
export const fromTrusted: unique symbol = Symbol("fromTrusted")
