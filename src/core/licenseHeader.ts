/**
 * Core - License Header
 *
 * Pure text rules for the header block: what it looks like, how a file is
 * recognised as already licensed, and how the block is prepended.
 */

/** Prefix that marks a file as already carrying a license header. */
export const LICENSE_MARKER = '/* Copyright'

export const DEFAULT_LICENSE_HEADER = `/* Copyright 2025 The Project Authors
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */`

/**
 * Idempotency guard.
 *
 * This is a prefix check, not a structural one: any file whose content
 * happens to start with the marker counts as licensed, even when the text
 * that follows is not a license.
 */
export function hasLicenseMarker(content: string, marker: string = LICENSE_MARKER): boolean {
  return content.startsWith(marker)
}

/** Header text with trailing whitespace dropped, followed by one blank line. */
export function toHeaderBlock(headerText: string): string {
  return `${headerText.replace(/\s+$/u, '')}\n\n`
}

export function prependHeader(content: string, headerBlock: string): string {
  return headerBlock + content
}
