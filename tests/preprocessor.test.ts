// tests/preprocessor.test.ts
import { describe, expect, it, vi } from "vitest";
import {
  ShaderPreprocessor,
  type ShaderSourceReader,
} from "@/core/shaders/preprocessor";
import { Shader } from "@/core/shaders/shader";
import { createFakeDevice } from "./helpers/fakeDevice";

const inMemory = (files: Record<string, string>) =>
  vi.fn<ShaderSourceReader>(async (url) => {
    const source = files[url.href];
    if (source === undefined) throw new Error(`ENOENT: ${url.href}`);
    return source;
  });

const root = new URL("file:///shaders/main.wgsl");

describe("ShaderPreprocessor", () => {
  it("should return a file without includes unchanged", async () => {
    const reader = inMemory({ [root.href]: "fn main() {}" });
    const code = await new ShaderPreprocessor(reader).process(root);
    expect(code).toBe("fn main() {}");
  });

  it("should resolve includes relative to the including file", async () => {
    const reader = inMemory({
      "file:///shaders/main.wgsl": '#include "common/a.wgsl"\nfn main() {}',
      "file:///shaders/common/a.wgsl": '#include "b.wgsl"\nfn a() {}',
      "file:///shaders/common/b.wgsl": "fn b() {}",
    });
    const code = await new ShaderPreprocessor(reader).process(root);
    expect(code).toBe("fn b() {}\nfn a() {}\nfn main() {}");
  });

  it("should read a file included twice only once", async () => {
    const reader = inMemory({
      "file:///shaders/main.wgsl":
        '#include "x.wgsl"\n#include "y.wgsl"\nfn main() {}',
      "file:///shaders/x.wgsl": '#include "shared.wgsl"\nfn x() {}',
      "file:///shaders/y.wgsl": '#include "shared.wgsl"\nfn y() {}',
      "file:///shaders/shared.wgsl": "const K: f32 = 1.0;",
    });
    const preprocessor = new ShaderPreprocessor(reader);
    await preprocessor.process(root);
    await preprocessor.process(root);

    const sharedReads = reader.mock.calls.filter(
      ([url]) => url.href === "file:///shaders/shared.wgsl",
    );
    expect(sharedReads).toHaveLength(1);
    expect(reader).toHaveBeenCalledTimes(4);
  });

  it("should reject circular includes", async () => {
    const reader = inMemory({
      "file:///shaders/main.wgsl": '#include "a.wgsl"',
      "file:///shaders/a.wgsl": '#include "main.wgsl"',
    });
    await expect(new ShaderPreprocessor(reader).process(root)).rejects.toThrow(
      "Circular dependency detected in shaders: file:///shaders/main.wgsl",
    );
  });

  it("should name the file it could not read", async () => {
    const reader = inMemory({
      "file:///shaders/main.wgsl": '#include "missing.wgsl"',
    });
    await expect(new ShaderPreprocessor(reader).process(root)).rejects.toThrow(
      "Could not read shader file: file:///shaders/missing.wgsl",
    );
  });

  it("should retry a file after a failed read", async () => {
    const reader = vi
      .fn<ShaderSourceReader>()
      .mockRejectedValueOnce(new Error("EBUSY"))
      .mockResolvedValueOnce("fn main() {}");
    const preprocessor = new ShaderPreprocessor(reader);

    await expect(preprocessor.process(root)).rejects.toThrow(
      "Could not read shader file",
    );
    await expect(preprocessor.process(root)).resolves.toBe("fn main() {}");
  });
});

describe("Shader", () => {
  it("should compile the flattened source with the default entry points", async () => {
    const { device } = createFakeDevice();
    const reader = inMemory({
      "file:///shaders/main.wgsl": '#include "a.wgsl"\nfn main() {}',
      "file:///shaders/a.wgsl": "fn a() {}",
    });

    const shader = await Shader.fromFile(
      device,
      new ShaderPreprocessor(reader),
      root,
      "TEST_SHADER",
    );

    expect(shader.code).toBe("fn a() {}\nfn main() {}");
    expect(shader.vertexEntryPoint).toBe("vs_main");
    expect(shader.fragmentEntryPoint).toBe("fs_main");
    expect(device.createShaderModule).toHaveBeenCalledWith({
      label: "TEST_SHADER",
      code: "fn a() {}\nfn main() {}",
    });
  });

  it("should not compile a source its check rejects", async () => {
    const { device } = createFakeDevice();
    const reader = inMemory({ [root.href]: "fn main() {}" });

    await expect(
      Shader.fromFile(device, new ShaderPreprocessor(reader), root, "X", () => {
        throw new Error("rejected");
      }),
    ).rejects.toThrow("rejected");
    expect(device.createShaderModule).not.toHaveBeenCalled();
  });
});
