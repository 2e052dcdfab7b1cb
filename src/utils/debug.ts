import createDebug from "debug";

// Central debug namespace helper so every module logs under `reelcap:*`.
const BASE_NAMESPACE = "reelcap";

export const makeDebug = (scope: string) => createDebug(`${BASE_NAMESPACE}:${scope}`);

// Turns on the library's logs programmatically; `DEBUG=reelcap:*` does the same from the shell.
export const enableDebugLogging = (pattern = `${BASE_NAMESPACE}:*`) => {
  createDebug.enable(pattern);
};

export default makeDebug;
