/**
 * MCP Resources Module
 *
 * Exports resource handlers for the MCP protocol.
 */

export { RESOURCES, OPERATORS_HELP, EXPORT_FORMAT_HELP, listResources, getResourceContent } from './help.js';
export type { Resource } from './help.js';
