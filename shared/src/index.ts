/**
 * @apply-portal/shared
 *
 * Shared TypeScript types and runtime schemas for the application portal
 */

// Core types
export * from "./application.types"

// API types
export * from "./api.types"
export * from "./api/application.types"

// Type guards and utilities
export * from "./guards"

// Runtime schemas (Zod)
export * from "./schemas"
