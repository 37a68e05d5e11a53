// Core types
export type { DataInput, InputMatcher, MatchingData } from "./types.ts";
// Test fakes: import from "midimacro/testing"

// Match checkers
export { AnyMatcher } from "./any-matcher.ts";
export { RangeMatcher, ValueMatcher, matchesOptional } from "./number-matchers.ts";
export type { NumberMatcher } from "./number-matchers.ts";
export {
	ContainsMatcher,
	ExactMatcher,
	MatcherError,
	PrefixMatcher,
	RegexMatcher,
	SuffixMatcher,
	describeStringMatcher,
} from "./string-matchers.ts";
export type { StringMatcher } from "./string-matchers.ts";

// Predicates
export { And, SinglePredicate, andPredicate } from "./predicate.ts";
export type { Predicate } from "./predicate.ts";

// MIDI
export {
	MIDI_MESSAGE_FIELDS,
	MIDI_MESSAGE_TYPES,
	formatMidiMessage,
	isMidiFieldOf,
	isMidiMessageType,
	midiFieldsOf,
	readMidiField,
} from "./midi/message.ts";
export type {
	ChannelAftertouch,
	ControlChange,
	MidiField,
	MidiMessage,
	MidiMessageType,
	NoteOff,
	NoteOn,
	PitchBend,
	PolyAftertouch,
	ProgramChange,
} from "./midi/message.ts";
export { MidiStreamParser, parseMidiMessage } from "./midi/parser.ts";
export { MidiState } from "./midi/state.ts";

// Events, gates, state
export { MidiEventMatcher, MidiFieldInput, midiEvent } from "./events.ts";
export type { Event, EventMatcher, MidiEvent, MidiFieldMatchers } from "./events.ts";
export { MIDI_CONDITION_FIELDS, evaluatePrecondition, midiPrecondition } from "./preconditions.ts";
export type { MidiCondition, MidiConditionKind, Precondition } from "./preconditions.ts";
export { NO_FOCUSED_WINDOW, Scope, WindowClassInput, WindowNameInput } from "./scope.ts";
export type { FocusedWindow } from "./scope.ts";
export { StateSnapshot, StateStore } from "./state.ts";
export type { State } from "./state.ts";

// Macros and actions
export { combination, enterText, keySequence, shell } from "./actions.ts";
export type { Action, ActionType } from "./actions.ts";
export { Macro, MacroBuildError, MacroBuilder } from "./macro.ts";
export { ActionRunner, DEFAULT_KEY_DELAY_US } from "./runner.ts";
export { MacroPad, RuleEngine } from "./engine.ts";
export type { MacroHit, MacroPadAdapters, MacroPadOptions } from "./engine.ts";
export { EventQueue } from "./queue.ts";

// Configuration
export {
	ConfigError,
	ConfigParseError,
	DEFAULT_GLOBAL_SETTINGS,
	InvalidConfigError,
	UnsupportedVersionError,
	loadConfig,
	loadConfigFile,
	parseConfigText,
	resolveConfig,
	supportedVersions,
	toRawValue,
} from "./config/index.ts";
export type { Config, ConfigResult, ConfigSource, GlobalSettings, RawValue } from "./config/index.ts";

// Adapters
export { AdapterError } from "./adapters/types.ts";
export type {
	DeviceListener,
	FocusTracker,
	KeyboardAdapter,
	ProcessSpawner,
} from "./adapters/types.ts";
export { ChildProcessSpawner } from "./adapters/process.ts";
export { RawMidiListener } from "./adapters/rawmidi.ts";
export { XdotoolFocusTracker, XdotoolKeyboard } from "./adapters/xdotool.ts";

// Logging
export { getLogger, initLogger } from "./logger.ts";
export type { LogLevel, Logger } from "./logger.ts";
