export { key, keysFromText, describeKey, type KeyEvent, type NamedKey } from './keys.js';
export {
  PromptError,
  CancelledError,
  PromptIoError,
  ConstructionError,
  PromptStateError,
  isCancelled,
  type PromptErrorCode,
} from './errors.js';
export { LineEditor } from './line-editor.js';
export { ListNavigator, DEFAULT_ITEMS_PER_PAGE } from './list-navigator.js';
export { accepted, rejected, type Check, type ValidationOutcome } from './validation.js';

export { Confirm, type ConfirmOptions } from './widgets/confirm.js';
export { Toggle, type ToggleOptions } from './widgets/toggle.js';
export { Text, type TextOptions } from './widgets/text.js';
export { Password, type PasswordOptions } from './widgets/password.js';
export { NumberPrompt, NUMBER_TYPES, type NumberOptions, type NumberType } from './widgets/number.js';
export { Select } from './widgets/select.js';
export { MultiSelect, type MultiSelectSettings } from './widgets/multi-select.js';
export { Message } from './widgets/message.js';
export { choices, type ListSettings, type SelectOption } from './widgets/options.js';
export type { WidgetStatus } from './widgets/lifecycle.js';
export type { Widget, WidgetKind, WidgetView } from './widgets/types.js';

export { span, line, lineText, frameText, type RenderFrame, type Line, type Span, type SpanStyle } from './render/frame.js';
export { project, UNICODE_GLYPHS, ASCII_GLYPHS, type Glyphs, type ProjectionOptions } from './render/projection.js';

export {
  PromptTask,
  runPrompt,
  ScriptedSource,
  RecordingRenderer,
  type EventSource,
  type Renderer,
  type DriverOptions,
  type StepResult,
} from './driver.js';
export { TerminalKeySource, decodeKeypress, type KeySourceOptions } from './terminal/key-source.js';
export { AnsiRenderer, type AnsiRendererOptions } from './terminal/ansi-renderer.js';
export { withTerminal, type TerminalOptions, type TerminalSession } from './terminal/session.js';

export { createLogger, type Log } from './logger.js';
export { Tracker } from './tracker.js';
export { loadForm, saveForm, parseForm, type Form, type FormInput, type Question } from './config.js';
export { buildWidget, runForm, runPrompts, type Answer, type Answers } from './form.js';
