export {
  compilePattern,
  parsePattern,
  PatternError,
  type PathPattern,
  type PathParams,
  type PatternSegment,
} from "./patterns";

export {
  classifyRoute,
  PATHS,
  ROUTE_RULES,
  type Route,
  type RouteKind,
  type RouteMethod,
} from "./routes";
