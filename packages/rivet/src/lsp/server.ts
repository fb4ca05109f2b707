import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeParams,
  CompletionItem,
  TextDocumentSyncKind,
  InitializeResult,
  Connection,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { computeDiagnostics, hoverAt, keywordCompletions, resolveCompletion } from './features';

function publish(connection: Connection, uri: string, text: string | null) {
  const diagnostics = text === null ? [] : computeDiagnostics(text);
  connection.sendDiagnostics({ uri, diagnostics }).catch((err: unknown) => {
    connection.console.error(`could not publish diagnostics for ${uri}: ${String(err)}`);
  });
}

/** Whether the arguments name a transport that createConnection picks up itself. */
export function hasTransportFlag(argv: string[]): boolean {
  return argv.some(
    (arg) =>
      arg === '--stdio' ||
      arg === '--node-ipc' ||
      arg.startsWith('--socket=') ||
      arg.startsWith('--pipe='),
  );
}

/**
 * Serve syntax diagnostics, keyword completion and hovers. The transport
 * comes from the command line (--stdio, --node-ipc, --socket or --pipe);
 * without one the server speaks over stdin and stdout.
 */
export function startServer(argv: string[] = process.argv): void {
  // Also include all preview / proposed LSP features.
  const connection = hasTransportFlag(argv)
    ? createConnection(ProposedFeatures.all)
    : createConnection(ProposedFeatures.all, process.stdin, process.stdout);
  const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

  connection.onInitialize((_params: InitializeParams) => {
    const result: InitializeResult = {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        completionProvider: {
          resolveProvider: true
        },
        hoverProvider: true
      }
    };
    return result;
  });

  connection.onInitialized(() => {
    connection.console.info('rivet language server ready');
  });

  // Emitted when a document is first opened and whenever its content changes.
  documents.onDidChangeContent(change => {
    publish(connection, change.document.uri, change.document.getText());
  });

  documents.onDidClose(event => {
    publish(connection, event.document.uri, null);
  });

  connection.onCompletion((): CompletionItem[] => keywordCompletions());

  connection.onCompletionResolve((item: CompletionItem): CompletionItem => resolveCompletion(item));

  connection.onHover((params) => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return null;
    return hoverAt(doc.getText(), params.position.line, params.position.character);
  });

  // Make the text document manager listen on the connection
  // for open, change and close text document events
  documents.listen(connection);
  connection.listen();
}
