import { McpTool } from '../types';

export const getInformationMartScriptTool: McpTool = {
  name: 'get_information_mart_script',
  description: `Get an information mart script with its code, its columns and the source columns each column reads.`,
  parameters: {
    type: 'object',
    properties: {
      projectName: {
        type: 'string',
        description: 'Technical name of the project (use technicalName from get_projects)',
      },
      informationMartIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the information mart',
      },
      scriptIdOrName: {
        type: 'string',
        description: 'ID (GUID) or name of the script',
      },
    },
    required: ['projectName', 'informationMartIdOrName', 'scriptIdOrName'],
  },
  returns: {
    type: 'object',
    description: 'Script entity including columns and their sourceColumns',
  },
  annotations: {
    title: 'Get Information Mart Script',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};
