export {
  loadYamlSettings,
  parseYamlSettings,
  formatFriendlyError,
  type FriendlyError,
  type ParseErrorType,
  type ParseResult,
} from "./friendly-errors";
