// Simulation constants
export const SECONDS_PER_DAY = 24 * 3600;
/** Gravitational constant in km^3 kg^-1 day^-2 */
export const G = 6.6743e-11 * SECONDS_PER_DAY * SECONDS_PER_DAY * 1e-9;
export const MAX_ID_LENGTH = 16; // ship and body ids
export const KEPLER_MAX_ITERATIONS = 10;
export const E_TOLERANCE = 1e-6; // degrees
export const MAX_CATCHUP_STEPS = 5; // fixed steps run at most per loop frame after a stall
export const DEFAULT_SIM_HZ = 60;
export const DEFAULT_BROADCAST_HZ = 60;
export const DEFAULT_STEP_SIZE = 1; // days per tick
export const DEFAULT_UNRELIABLE_MAX_BUFFERED_BYTES = 64 * 1024;
