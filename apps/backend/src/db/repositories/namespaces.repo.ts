import { asc, eq } from "drizzle-orm";

import { HomologyError } from "../../lib/homology/errors.js";
import type { Namespace } from "../../lib/homology/types.js";
import { db } from "../index.js";
import { namespacesTable } from "../schema.js";
import { toNamespace } from "./mappers.js";

/**
 * Namespaces Repository
 *
 * Read access to the namespaces table. Namespaces are written by the data
 * loader, never by the service.
 */
export class NamespacesRepository {
  async findAll(): Promise<Namespace[]> {
    const rows = await db
      .select()
      .from(namespacesTable)
      .orderBy(asc(namespacesTable.namespace_id));

    return rows.map(toNamespace);
  }

  /**
   * Find a namespace by ID
   *
   * @throws HomologyError NO_SUCH_NAMESPACE if there is no such namespace
   */
  async findById(namespaceId: string): Promise<Namespace> {
    const [row] = await db
      .select()
      .from(namespacesTable)
      .where(eq(namespacesTable.namespace_id, namespaceId));

    if (!row) {
      throw new HomologyError(
        "NO_SUCH_NAMESPACE",
        `No such namespace: ${namespaceId}`,
        { details: { namespaceId } },
      );
    }
    return toNamespace(row);
  }
}

export const namespacesRepository = new NamespacesRepository();
