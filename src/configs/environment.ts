// Environment variables
export const DEFAULT_SEARCH_TEXT = import.meta.env.VITE_DEFAULT_SEARCH_TEXT || "AABAACAADAABAABA";
export const DEFAULT_SEARCH_PATTERN = import.meta.env.VITE_DEFAULT_SEARCH_PATTERN || "AABA";

// Logs every session command to the console; handy when checking a trace by hand.
export const ENABLE_SEARCH_TRACE = import.meta.env.VITE_ENABLE_SEARCH_TRACE === "true";
