/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const BundleNameBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const GitUrlBrand: unique symbol
declare const UniversalPathBrand: unique symbol
declare const ContentHashBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type BundleName = Brand<string, typeof BundleNameBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
export type GitUrl = Brand<string, typeof GitUrlBrand>
/** Forward-slash path relative to a bundle root, before any transformation. */
export type UniversalPath = Brand<string, typeof UniversalPathBrand>
/** `sha256:<hex>` digest. */
export type ContentHash = Brand<string, typeof ContentHashBrand>
