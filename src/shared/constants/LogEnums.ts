/**
 * Log level enumerations for the simulation system.
 *
 * Defines all log levels used in the logging system.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which part of the simulation
 * generated the log. Useful for filtering and analyzing behavior by subsystem.
 */
export enum LogCategory {
  /** Round loop, phases and lifecycle of a run */
  SIMULATION = "simulation",
  /** Lender/borrower encounters */
  ENCOUNTER = "encounter",
  /** Strategy construction and decisions */
  STRATEGY = "strategy",
  /** Agent creation and culling */
  POPULATION = "population",
  /** Configuration loading and validation */
  CONFIG = "config",
  /** Reporting collaborator */
  REPORT = "report",
  /** General/uncategorized logs */
  GENERAL = "general",
}
