export const STUBLAYER_HOME_ENV = "STUBLAYER_HOME";
export const STUBLAYER_DEBUG_ENV = "STUBLAYER_DEBUG";
