export const SERVICE_NAME = "affect-api";
export const SERVICE_VERSION = "1.0.0";
