import { McpTool } from '../types';

export const getProjectsTool: McpTool = {
  name: 'get_projects',
  description: `List the projects the configured account can read.

Use the technicalName of a project as the projectName parameter of the other tools.`,
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  returns: {
    type: 'object',
    properties: {
      projects: {
        type: 'array',
        description: 'Projects with id, name, technicalName, displayName and entity counts',
        items: { type: 'object' },
      },
    },
  },
  annotations: {
    title: 'Get Projects',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
