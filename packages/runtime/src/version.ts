export const SERVER_NAME = "tooldeck";
export const SERVER_VERSION = "0.1.0";
