/**
 * All available notes-toolkit commands, in the order they are listed in help
 */

import type { Command } from "./types.js";
import { ReorderColumns } from "./ReorderColumns.js";
import { ReverseTable } from "./ReverseTable.js";
import { SplitByYear } from "./SplitByYear.js";
import { ConvertDates } from "./ConvertDates.js";
import { RemoveEmptyLinks } from "./RemoveEmptyLinks.js";
import { InlineLinks } from "./InlineLinks.js";
import { RemoveTag } from "./RemoveTag.js";
import { RenameFrontmatterKey } from "./RenameFrontmatterKey.js";
import { CheckFrontmatter } from "./CheckFrontmatter.js";

export const commands: Command[] = [
  ReorderColumns,
  ReverseTable,
  SplitByYear,
  ConvertDates,
  RemoveEmptyLinks,
  InlineLinks,
  RemoveTag,
  RenameFrontmatterKey,
  CheckFrontmatter,
];
