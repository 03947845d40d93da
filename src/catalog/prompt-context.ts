/**
 * Renders the catalog as few-shot context for the classifier.
 */

import type { ToolCatalog } from './catalog';

export function buildToolsContext(catalog: ToolCatalog): string {
  if (catalog.size === 0) {
    return 'No tools available';
  }

  return catalog
    .all()
    .map((tool) => {
      const lines = [
        `Tool: ${tool.name}`,
        `Description: ${tool.description}`,
        `Capabilities: ${tool.capabilities.join(', ')}`,
        `Parameters (Required): ${tool.parameters.required.join(', ') || 'None'}`,
        `Parameters (Optional): ${tool.parameters.optional.join(', ') || 'None'}`,
      ];

      if (tool.examples.length > 0) {
        lines.push('Examples:');
        for (const example of tool.examples) {
          lines.push(`- "${example.prompt}"${example.reasoning ? ` → ${example.reasoning}` : ''}`);
        }
      }

      return lines.join('\n');
    })
    .join('\n\n');
}
