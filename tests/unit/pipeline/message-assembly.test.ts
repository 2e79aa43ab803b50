import { assembleUserMessage, buildContextString, hasStructuredContext } from "../../../src/pipeline/message-assembly";

describe("hasStructuredContext", () => {
  it("is false for missing or empty context", () => {
    expect(hasStructuredContext(undefined)).toBe(false);
    expect(hasStructuredContext({})).toBe(false);
    expect(hasStructuredContext({ openFiles: [] })).toBe(false);
  });

  it("is true for open files or a workspace tree", () => {
    expect(hasStructuredContext({ openFiles: [{ path: "a.js", content: "" }] })).toBe(true);
    expect(hasStructuredContext({ workspaceTree: { root: "app", children: [] } })).toBe(true);
  });
});

describe("buildContextString", () => {
  it("renders the workspace tree with its root and JSON", () => {
    const tree = { root: "app", children: [{ name: "src", type: "folder" }] };
    expect(buildContextString({ workspaceTree: tree })).toBe(
      ["<workspace_structure>", "<root>app</root>", JSON.stringify(tree, null, 2), "</workspace_structure>"].join("\n")
    );
  });
});

describe("assembleUserMessage", () => {
  it("wraps a bare query", () => {
    expect(assembleUserMessage({ query: "hi", isModification: false })).toBe("<user_request>\nhi\n</user_request>");
  });

  it("prepends open files as workspace context", () => {
    const msg = assembleUserMessage({
      query: "fix it",
      context: { openFiles: [{ path: "src/App.jsx", content: "const a = 1;" }] },
      isModification: true,
    });
    expect(msg).toBe(
      "<workspace_context>\n<open_files>\n<file path='src/App.jsx'>\nconst a = 1;\n</file>\n</open_files>\n</workspace_context>\n" +
        "\n<user_request>\nfix it\n</user_request>"
    );
  });

  it("attaches previous code for a modification without context", () => {
    expect(assembleUserMessage({ query: "q", isModification: true, previousCode: "PREV" })).toBe(
      "<previous_code>\nPREV\n</previous_code>\n\n<user_request>\nq\n</user_request>"
    );
  });

  it("omits previous code when the request is not a modification", () => {
    expect(assembleUserMessage({ query: "q", isModification: false, previousCode: "PREV" })).toBe(
      "<user_request>\nq\n</user_request>"
    );
  });

  it("prefers workspace context over previous code", () => {
    expect(
      assembleUserMessage({
        query: "q",
        context: { openFiles: [{ path: "a.js", content: "x" }] },
        isModification: true,
        previousCode: "PREV",
      })
    ).toBe("<workspace_context>\n<open_files>\n<file path='a.js'>\nx\n</file>\n</open_files>\n</workspace_context>\n\n<user_request>\nq\n</user_request>");
  });
});
