/** Non-fatal problems met while running a pipeline. */
export type PipelineDiagnostic =
  | {
      readonly kind: 'skipped_run';
      readonly dataset: string;
      readonly runId: string;
      readonly algorithm: string;
      readonly reason: string;
    }
  | {
      readonly kind: 'invalid_file';
      readonly dataset: string;
      readonly path: string;
      readonly reason: string;
    }
  | { readonly kind: 'empty_dataset'; readonly dataset: string }
  | { readonly kind: 'dataset_unavailable'; readonly dataset: string; readonly reason: string };

export type DiagnosticHandler = (diagnostic: PipelineDiagnostic) => void;

/** Describe a diagnostic in one line for terminal output. */
export function describeDiagnostic(diagnostic: PipelineDiagnostic): string {
  switch (diagnostic.kind) {
    case 'skipped_run':
      return `Skipped run ${diagnostic.runId} (${diagnostic.algorithm}): ${diagnostic.reason}`;
    case 'invalid_file':
      return `Ignored ${diagnostic.path}: ${diagnostic.reason}`;
    case 'empty_dataset':
      return `No runs stored for dataset ${diagnostic.dataset}`;
    case 'dataset_unavailable':
      return `Dataset ${diagnostic.dataset} unavailable: ${diagnostic.reason}`;
  }
}
