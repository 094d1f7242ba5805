import type { PluginDescriptor } from "../pluginRegistry.js";
import { pollPlugin } from "./poll.js";

/** Every integration shipped with the server, registered once at startup. */
export const builtInPlugins: PluginDescriptor[] = [pollPlugin];

export { pollPlugin };
