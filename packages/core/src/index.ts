export { SchemaError, DeclarationError, TypeCastError, UnknownAttributeError } from './errors.js'
export {
  ALLOWED_ATTRIBUTE_OPTIONS,
  RESOURCE_TYPE,
  normalizeKindName,
  humanize,
  isXmlName,
  type Primitive,
  type AttributeValue,
  type AttributeSource,
  type AttributeOptions,
  type TypeDescriptor,
  type ContainerAttributeValue,
  type ContainerMetadata,
  type Element,
  type Slot,
} from './descriptor.js'
export { createTypeCaster, defaultCaster, builtinCasts, type TypeCaster, type CastValue, type PrimitiveCast } from './caster.js'
export { ResourceKind } from './kind.js'
export { Resource } from './resource.js'
export { SchemaRegistry, registry, defineKind, type RegistryOptions } from './registry.js'
export {
  ValidationErrors,
  validate,
  collectIssues,
  isBlank,
  presenceRule,
  fullMessage,
  BLANK,
  INVALID_RESOURCE,
  type AttributeError,
  type ValidationRule,
  type ValidationResult,
  type NestedValidation,
} from './validation.js'
export { serializableView, type SerializedValue, type SerializedView, type ViewTransform } from './serialization.js'
export { renderXml, type MarkupRenderer } from './markup.js'
export {
  parseSchemaDocument,
  loadSchemaDocument,
  defineKindsFromDocument,
  SchemaDocumentSource,
  type ExternalSchemaSource,
  type ExternalAttribute,
} from './external-schema.js'
