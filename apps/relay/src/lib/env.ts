/**
 * Relay configuration, validated on import. Fail-fast on startup.
 *
 * Import this module early in the entry point: a bad port or log level
 * throws a ConfigError naming every offending key.
 */

import { loadRelayConfig } from '@scenesync/config'

export const env = loadRelayConfig(process.env)
