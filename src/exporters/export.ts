import { SqliteGraphStore } from '../storage/database.js';
import type { Entry, GraphEdge } from '../types/index.js';
import { ADJACENCY_KINDS, formulaOf, clusterKeyOf } from '../types/index.js';
import { writeFileSync } from 'node:fs';
import { CALCGRAPH_VERSION } from '../builder/graph-builder.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'graphml', 'csv', 'mermaid'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    graphml: '.graphml',
    csv: '.csv',
    mermaid: '.md',
};

export interface ExportData {
    entries: Entry[];
    edges: GraphEdge[];
}

export function isExportFormat(value: string): value is ExportFormat {
    const formats: readonly string[] = EXPORT_FORMATS;
    return formats.includes(value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export the graph held in an existing calcgraph database to a specified format.
 * Throws `StoreError` when `dbPath` does not exist.
 */
export function exportGraph(
    dbPath: string,
    outputPath: string,
    format: ExportFormat
): void {
    const db = new SqliteGraphStore(dbPath, { mustExist: true });

    try {
        const data: ExportData = {
            entries: db.getAllEntries(),
            edges: db.getAllEdges(),
        };

        writeFileSync(outputPath, renderGraph(data, format), 'utf-8');
        getLogger().info({ format, outputPath, entries: data.entries.length, edges: data.edges.length }, 'Graph exported');
    } finally {
        db.close();
    }
}

/**
 * Render graph data in the given format.
 */
export function renderGraph(data: ExportData, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(data);
        case 'graphml':
            return exportGraphML(data);
        case 'csv':
            return exportCSV(data);
        case 'mermaid':
            return exportMermaid(data);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(data: ExportData): string {
    return JSON.stringify({
        calcgraph: {
            version: CALCGRAPH_VERSION,
            exported_at: new Date().toISOString(),
        },
        entries: data.entries.map((e) => ({
            id: e.id,
            type: e.type,
            formula: e.formula ?? null,
            cluster_key: e.cluster_key ?? null,
            name: e.name ?? null,
            has_input_files: e.has_input_files,
            has_output_files: e.has_output_files,
        })),
        edges: data.edges.map((e) => ({
            source: e.from_id,
            target: e.to_id,
            kind: e.kind,
            confidence: e.confidence,
            cluster_key: e.cluster_key,
            properties: e.properties,
        })),
    }, null, 2);
}

function escapeXml(s: string | null | undefined): string {
    return (s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function exportGraphML(data: ExportData): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="type" for="node" attr.name="type" attr.type="string"/>
  <key id="formula" for="node" attr.name="formula" attr.type="string"/>
  <key id="cluster" for="node" attr.name="cluster_key" attr.type="string"/>
  <key id="kind" for="edge" attr.name="kind" attr.type="string"/>
  <key id="confidence" for="edge" attr.name="confidence" attr.type="double"/>
  <graph id="calcgraph" edgedefault="directed">
`;

    for (const entry of data.entries) {
        xml += `    <node id="${escapeXml(entry.id)}">
      <data key="type">${escapeXml(entry.type)}</data>
      <data key="formula">${escapeXml(entry.formula)}</data>
      <data key="cluster">${escapeXml(entry.cluster_key)}</data>
    </node>
`;
    }

    for (const edge of data.edges) {
        xml += `    <edge source="${escapeXml(edge.from_id)}" target="${escapeXml(edge.to_id)}">
      <data key="kind">${edge.kind}</data>
      <data key="confidence">${edge.confidence}</data>
    </edge>
`;
    }

    xml += `  </graph>
</graphml>`;

    return xml;
}

function csvField(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function exportCSV(data: ExportData): string {
    let csv = 'entry_id,type,formula,cluster_key,has_input_files,has_output_files\n';
    for (const entry of data.entries) {
        csv += [
            csvField(entry.id),
            csvField(entry.type),
            csvField(formulaOf(entry)),
            csvField(clusterKeyOf(entry)),
            entry.has_input_files,
            entry.has_output_files,
        ].join(',') + '\n';
    }

    csv += '\n# EDGES\nfrom_id,to_id,kind,confidence,cluster_key\n';
    for (const edge of data.edges) {
        csv += [
            csvField(edge.from_id),
            csvField(edge.to_id),
            edge.kind,
            edge.confidence,
            csvField(edge.cluster_key),
        ].join(',') + '\n';
    }

    return csv;
}

function exportMermaid(data: ExportData): string {
    let diagram = 'graph TD\n';

    // Mermaid ids must be plain identifiers; entry ids are opaque
    const nodeIds = new Map<string, string>();
    data.entries.forEach((entry, index) => {
        const nodeId = `E${index}`;
        nodeIds.set(entry.id, nodeId);
        const label = [entry.formula, entry.type].filter(Boolean).join(' ').slice(0, 40).replace(/"/g, "'");
        diagram += `  ${nodeId}["${label}"]\n`;
    });

    diagram += '\n';

    const maxEdges = 100;
    const edgesToRender = data.edges.slice(0, maxEdges);

    for (const edge of edgesToRender) {
        const from = nodeIds.get(edge.from_id);
        const to = nodeIds.get(edge.to_id);
        if (from === undefined || to === undefined) continue;
        const style = ADJACENCY_KINDS.has(edge.kind) ? '-->' : '-.->';
        diagram += `  ${from} ${style}|${edge.kind}| ${to}\n`;
    }

    if (data.edges.length > maxEdges) {
        diagram += `\n  %% Note: ${data.edges.length - maxEdges} additional edges omitted\n`;
    }

    return diagram;
}
