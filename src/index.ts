export {
    Selector,
    SelectionDone,
    DONE,
    isDone,
    type SelectorOptions,
    type SelectorEvent,
    type SelectionResult,
    type SelectorOutcome,
} from "./selector";
export {
    Column,
    FILTER_PROMPT_CELLS,
    columnView,
    type ColumnOptions,
    type ColumnView,
    type FilterState,
    type PageInfo,
} from "./column";
export {
    StaticValues,
    entry,
    readCategory,
    readCategories,
    type Category,
    type CompletionValues,
    type Entry,
} from "./values";
export {
    binding,
    defaultKeyMap,
    keyString,
    matches,
    type ColumnKeyMap,
    type KeyBinding,
    type KeyHelp,
    type KeyMap,
} from "./keymap";
export {
    routeKey,
    type ColumnAction,
    type FilterAction,
    type Route,
    type SelectorAction,
} from "./router";
export {
    DEFAULT_LAYOUT,
    DESCRIPTION_ROWS,
    clamp,
    clampHeight,
    columnHeight,
    columnWidth,
    computeMaxHeight,
    resolveLayout,
    type LayoutConstants,
} from "./layout";
export { defaultStyles, paint, type Styles, type TextStyle } from "./styles";
export { filterTarget, filterTargets, subsequenceScore, type FilterMatch } from "./filter";
export { Paginator } from "./paginator";
export { FocusRing, type IFocusTarget } from "./focus";
export { renderFullHelp, renderShortHelp } from "./help";
export { renderColumn, renderSelector, type ViewContext } from "./view";
export {
    CLEAR_LINE,
    ENTER_SCREEN,
    EXIT_SCREEN,
    Screen,
    Session,
    TerminalWriter,
    type ITerminalWriter,
    type KeyInput,
    type SessionOptions,
} from "./session";
