/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // SHELL SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Shell: {
    /** Dialect table for the configured host */
    DialectRegistry: Symbol('Shell.DialectRegistry'),
    /** Wrapper script builder */
    ActivationScriptBuilder: Symbol('Shell.ActivationScriptBuilder'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (local adapters in production, fakes in tests)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    TempFiles: Symbol('Ports.TempFiles'),
    FileDigest: Symbol('Ports.FileDigest'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;
