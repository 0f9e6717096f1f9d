export { Synthesizer, createSynthesizer, EMPTY_CONTEXT_GUIDANCE, type AnswerSource, type SynthesisResult } from "./synthesizer.js";
export { formatContext, isEmptyContext } from "./context-formatter.js";
