// Missing signer check: vault withdrawals
export * from "./missing-signer.js";

// Missing owner check: treasury reads
export * from "./missing-owner.js";

// Unchecked arithmetic: ledger mint / burn
export * from "./integer-overflow.js";

// Re-initialization: one-time config setup
export * from "./reinitialization.js";

// Non-canonical PDA bumps
export * from "./pda-bump.js";

// Type cosplay: same layout, different account types
export * from "./type-cosplay.js";
