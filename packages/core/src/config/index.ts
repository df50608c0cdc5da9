export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
  NODE_ID_ENV,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  rootLayout,
  type RootLayout,
} from "./paths.js";
