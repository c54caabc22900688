export { loadAgentConfig, parseSimpleYaml } from './agent-config.js';
