// src/settings.ts

/** Name the platform is registered under in Homebridge's config.json. */
export const PLATFORM_NAME = 'SmartRent';

/** Must match the "name" in package.json. */
export const PLUGIN_NAME = 'homebridge-smartrent';
