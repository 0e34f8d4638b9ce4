/**
 * Prompt text for the chat turns
 */
import type { ContextItem } from '../types/chat.js';

const ACTION_BLOCK_SHAPE = `{
  "text": "Your explanation or message to the user",
  "gdbCommands": ["command1", "command2", "..."],
  "waitForOutput": true/false
}`;

export const SYSTEM_PROMPT = `You are an AI assistant that helps with programming and debugging inside a live GDB session.

YOU MUST RESPOND IN VALID JSON FORMAT according to this structure:
${ACTION_BLOCK_SHAPE}

- "text" is shown to the user.
- "gdbCommands" are executed in order in the user's GDB session. Use an empty array when no commands are needed.
- Set "waitForOutput" to true when you need to see the output of the commands before answering.

Do not include any text outside the JSON structure. Your entire response must be a single JSON object.`;

export const CONTEXT_BLOCK_HEADER = '\n\n--- Provided Context ---\n';

export const COMMAND_OUTPUT_CONTEXT_TYPE = 'command_output';
export const COMMAND_OUTPUT_DESCRIPTION = 'GDB Command Output';

export function buildContextBlock(items: ContextItem[]): string {
  if (items.length === 0) return '';

  let block = CONTEXT_BLOCK_HEADER;
  for (const item of items) {
    block += `Type: ${item.type}\nDescription: ${item.description}\n`;
    if (item.content) {
      block += `Content:\n\`\`\`\n${item.content}\n\`\`\`\n`;
    }
    block += '---\n';
  }
  return block;
}

/**
 * The user turn as sent to the model: context block first, then the message.
 */
export function buildUserContent(message: string, items: ContextItem[]): string {
  return buildContextBlock(items) + message;
}

export function buildReformatMessage(originalResponse: string): string {
  return `ERROR: Your previous response was not in the required JSON format.

YOU MUST RESPOND WITH VALID JSON ONLY. No text outside the JSON object is allowed.

Please reformat your entire response using EXACTLY this JSON structure and nothing else:
${ACTION_BLOCK_SHAPE}

Original response to reformat:
${originalResponse}`;
}

export function commandOutputContext(output: string): ContextItem {
  return {
    type: COMMAND_OUTPUT_CONTEXT_TYPE,
    description: COMMAND_OUTPUT_DESCRIPTION,
    content: output,
  };
}
