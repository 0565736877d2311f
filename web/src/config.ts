const trimSlash = (value: string) => value.replace(/\/+$/, '');

/** HTTP origin of the camera server; frame paths resolve against it. */
export const API_BASE = trimSlash(import.meta.env.VITE_API_BASE ?? 'http://localhost:8888');

export const WS_BASE = trimSlash(import.meta.env.VITE_WS_URL ?? 'ws://localhost:8888');
