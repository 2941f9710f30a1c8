export type { ToolContext, ToolResponse } from './types.js';

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { definition as d1, handle as h1 } from './register-project.js';
import { definition as d2, handle as h2 } from './list-projects.js';
import { definition as d3, handle as h3 } from './switch-project.js';
import { definition as d4, handle as h4 } from './current-project.js';
import { definition as d5, handle as h5 } from './get-health.js';
import { definition as d6, handle as h6 } from './update-training-status.js';
import { definition as d7, handle as h7 } from './scan-project.js';
import { definition as d8, handle as h8 } from './index-project.js';
import { definition as d9, handle as h9 } from './search-project.js';
import { definition as d10, handle as h10 } from './add-message.js';
import { definition as d11, handle as h11 } from './get-conversation.js';

import type { ToolContext, ToolResponse } from './types.js';

export const TOOLS: Tool[] = [d1, d2, d3, d4, d5, d6, d7, d8, d9, d10, d11];

export async function dispatchTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext
): Promise<ToolResponse> {
  switch (name) {
    case 'register_project':
      return h1(args, ctx);
    case 'list_projects':
      return h2(args, ctx);
    case 'switch_project':
      return h3(args, ctx);
    case 'current_project':
      return h4(args, ctx);
    case 'get_health':
      return h5(args, ctx);
    case 'update_training_status':
      return h6(args, ctx);
    case 'scan_project':
      return h7(args, ctx);
    case 'index_project':
      return h8(args, ctx);
    case 'search_project':
      return h9(args, ctx);
    case 'add_message':
      return h10(args, ctx);
    case 'get_conversation':
      return h11(args, ctx);
    default:
      return {
        content: [{ type: 'text', text: JSON.stringify({ error: `Unknown tool: ${name}` }) }],
        isError: true
      };
  }
}
