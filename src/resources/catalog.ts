// This module declares the static resource catalog exposed through resources/list and resources/templates/list.

import type { AppSettings } from '../config/settings.js';
import type { McpResource, McpResourceTemplate } from '../types/mcp.js';

const BUILTIN_RESOURCES: McpResource[] = [
  {
    uri: 'server://info',
    name: 'Server information',
    description: 'Server identity, protocol version, capabilities, and the active AI provider.',
    mimeType: 'application/json'
  },
  {
    uri: 'server://tools',
    name: 'Tool catalog',
    description: 'All registered tools with their JSON input schemas.',
    mimeType: 'application/json'
  }
];

const RESOURCE_TEMPLATES: McpResourceTemplate[] = [
  {
    uriTemplate: 'weather://current/{city}',
    name: 'Current weather',
    description: 'Current weather conditions for one city. Append ?units=imperial for Fahrenheit and mph.',
    mimeType: 'application/json'
  }
];

export function listResources(settings: AppSettings): McpResource[] {
  return [...BUILTIN_RESOURCES, ...settings.resources.documents];
}

export function listResourceTemplates(): McpResourceTemplate[] {
  return RESOURCE_TEMPLATES;
}
