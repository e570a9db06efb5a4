export * from "./SidecarMatcher";
export * from "./SidecarMatcherDefault";
