export {
  CodeAssistant,
  createCodeAssistant,
  type AskOptions,
  type AssistantAnswer,
  type CodeAssistantOptions,
} from "./code-assistant.js";
