import type { Logger } from "@strata/logger"
import { mock } from "vitest-mock-extended"
import type { SettingValue } from "../../ports/settings"
import {
  AmbiguousSubsetRequestError,
  InvalidParserError,
  InvalidSectionValueError,
  SectionNotFoundError,
  SourceParseError,
  SourceTypeError,
} from "../errors"
import { defineParser } from "../parser"
import { loadPolicy } from "../policy"
import { hasBoundViews, Settings } from "../settings"
import { projectParsers, rawProject, typedProject } from "./sample-project"

class ProjectSettings extends Settings {
  static override defaults = {
    general: { verbose: "no", log_level: "info" },
    reports: { enabled: "yes" },
  }

  static override parsers = {
    parameters: projectParsers.parameters,
    formats: projectParsers.formats,
  }

  declare parameters: Record<string, SettingValue>
}

describe("Settings", () => {
  describe("construction", () => {
    it("infers types on construction", () => {
      const settings = new Settings({
        general: { verbose: "true", seed: "43" },
        files: { test_chunk: "500", float_format: "%.4f" },
      })

      expect(settings.section("general").verbose).toBe(true)
      expect(settings.section("general").seed).toBe(43)
      expect(settings.section("files").test_chunk).toBe(500)
      expect(settings.section("files").float_format).toBe("%.4f")
    })

    it("keeps a section named __proto__ as an ordinary entry", () => {
      const settings = new Settings(JSON.parse('{"__proto__":{"a":"1"},"general":{"b":"2"}}'))

      expect([...settings.keys()]).toEqual(["__proto__", "general"])
      expect(settings.section("__proto__")).toEqual({ a: 1 })
      expect(settings.explain("__proto__")).toBe("object")
    })

    it("keeps strings when inference is off", () => {
      const settings = new Settings({ general: { seed: "43" } }, { inferTypes: false })

      expect(settings.inferTypes).toBe(false)
      expect(settings.section("general").seed).toBe("43")
    })

    it("loads the sample project into its typed form", () => {
      const settings = new Settings(rawProject)

      expect(settings.toObject()).toEqual(typedProject)
    })

    it("lets contents win over defaults key by key", () => {
      const settings = new Settings(
        { general: { verbose: "true" } },
        { defaults: { general: { verbose: false, seed: 1 }, files: { encoding: "utf-8" } } },
      )

      expect(settings.section("general")).toEqual({ verbose: true, seed: 1 })
      expect(settings.section("files")).toEqual({ encoding: "utf-8" })
    })

    it("layers option defaults over class defaults", () => {
      const settings = new ProjectSettings(
        { general: { verbose: "yes" } },
        { defaults: { general: { log_level: "debug" } } },
      )

      expect(settings.section("general")).toEqual({ verbose: true, log_level: "debug" })
      expect(settings.section("reports")).toEqual({ enabled: true })
    })

    it("does not mutate the defaults it merged", () => {
      const defaults = { general: { seed: "1" } }
      const settings = new Settings({ general: { verbose: "yes" } }, { defaults })

      settings.section("general").seed = 2

      expect(defaults).toEqual({ general: { seed: "1" } })
    })

    it("does not share state with its contents", () => {
      const contents = { general: { seed: "1" } }
      const settings = new Settings(contents, { inferTypes: false })

      settings.section("general").seed = "2"

      expect(contents.general.seed).toBe("1")
    })

    it("turns dates into ISO strings", () => {
      const settings = new Settings({ general: { at: new Date("2024-01-02T03:04:05.000Z") } })

      expect(settings.section("general").at).toBe("2024-01-02T03:04:05.000Z")
    })

    it("rejects contents that are not a mapping", () => {
      expect(() => new Settings(JSON.parse("[1, 2]"))).toThrow(SourceTypeError)
    })

    it("rejects values with no settings equivalent", () => {
      expect(() => new Settings({ general: { run: () => 1 } })).toThrow(SourceParseError)
    })

    it("logs the build through a child logger", () => {
      const logger = mock<Logger>()
      logger.child.mockReturnValue(logger)

      new Settings(rawProject, { name: "project", logger })

      expect(logger.child).toHaveBeenCalledWith({ module: "settings", store: "project" })
      expect(logger.debug).toHaveBeenCalledWith("Settings store built", {
        sections: 4,
        inferred: true,
      })
    })
  })

  describe("reads", () => {
    let settings: Settings

    beforeEach(() => {
      settings = new Settings(rawProject)
    })

    it("gets values with an optional fallback", () => {
      expect(settings.get("tasks")).toEqual({ things_to_do: ["stop", "drop", "roll"] })
      expect(settings.get("missing")).toBeUndefined()
      expect(settings.get("missing", "fallback")).toBe("fallback")
    })

    it("behaves like an ordered map", () => {
      expect(settings.size).toBe(4)
      expect(settings.has("files")).toBe(true)
      expect([...settings.keys()]).toEqual(["general", "files", "tasks", "tasks_parameters"])
      expect([...settings].map(([key]) => key)).toEqual([...settings.keys()])
      expect(settings.items()[3]).toEqual([
        "tasks_parameters",
        { start: "when_ready", end: "when_done" },
      ])
      expect([...settings.values()][2]).toEqual({ things_to_do: ["stop", "drop", "roll"] })
    })

    it("section() throws for a missing section", () => {
      expect(() => settings.section("missing")).toThrow(SectionNotFoundError)
    })

    it("serializes to a detached plain object", () => {
      const copy = settings.toObject()
      copy.extra = 1

      expect(settings.has("extra")).toBe(false)
      expect(JSON.parse(JSON.stringify(settings))).toEqual(typedProject)
    })

    it("fromKeys gives each key its own copy of the value", () => {
      const built = Settings.fromKeys(["alpha", "beta"], { enabled: "yes" })

      expect(built.toObject()).toEqual({ alpha: { enabled: true }, beta: { enabled: true } })
      expect(built.get("alpha")).not.toBe(built.get("beta"))
    })

    it("fromKeys builds the subclass it is called on", () => {
      expect(ProjectSettings.fromKeys(["alpha"], {})).toBeInstanceOf(ProjectSettings)
    })
  })

  describe("writes", () => {
    let settings: Settings

    beforeEach(() => {
      settings = new Settings(rawProject)
    })

    it("add() merges into an existing section, new keys winning", () => {
      settings.add("general", { seed: 7, threads: 4 })

      expect(settings.section("general")).toEqual({ ...typedProject.general, seed: 7, threads: 4 })
    })

    it("add() inserts a copy of a new section", () => {
      const reports = { enabled: true }

      settings.add("reports", reports)
      reports.enabled = false

      expect(settings.section("reports")).toEqual({ enabled: true })
    })

    it("add() rejects a non-mapping", () => {
      expect(() => settings.add("general", JSON.parse("5"))).toThrow(InvalidSectionValueError)
      expect(() => settings.add("general", JSON.parse("5"))).toThrow(
        'key must map to a dict-like value: "general"',
      )
    })

    it("set() replaces wholesale", () => {
      settings.set("general", { only: 1 }).set("version", "2")

      expect(settings.get("general")).toEqual({ only: 1 })
      expect(settings.get("version")).toBe("2")
    })

    it("set() stores a copy of the value", () => {
      const general = { only: 1 }

      settings.set("general", general)
      settings.add("general", { extra: 2 })

      expect(general).toEqual({ only: 1 })
      expect(settings.section("general")).toEqual({ only: 1, extra: 2 })
    })

    it("delete() removes an entry", () => {
      expect(settings.delete("tasks")).toBe(true)
      expect(settings.has("tasks")).toBe(false)
    })

    it("delete() raises for a missing key by default", () => {
      expect(() => settings.delete("missing")).toThrow(SectionNotFoundError)
    })

    it("delete() ignores a missing key when the policy says so", () => {
      const policy = loadPolicy({ overrides: { missingKeys: "ignore" } })
      const lenient = new Settings({}, { policy })

      expect(lenient.delete("missing")).toBe(false)
    })
  })

  describe("inject", () => {
    it("keeps truthy attributes unless overwriting", () => {
      const settings = new Settings({ widget: { foo: 2 } })

      expect(settings.inject({ name: "widget", foo: 1 }).foo).toBe(1)
      expect(settings.inject({ name: "widget", foo: 1 }, { overwrite: true }).foo).toBe(2)
    })

    it("fills missing and falsy attributes from the section named like the target", () => {
      const settings = new Settings(rawProject)
      const target = { name: "files", source_format: "keep", float_format: "", extras: [] }

      settings.inject(target)

      expect(target).toMatchObject({
        source_format: "keep",
        float_format: "%.4f",
        test_chunk: 500,
      })
    })

    it("treats empty arrays and mappings as falsy", () => {
      const settings = new Settings({ widget: { tags: ["a"], meta: { b: 1 } } })

      const target = settings.inject({ name: "widget", tags: [], meta: {} })

      expect(target).toEqual({ name: "widget", tags: ["a"], meta: { b: 1 } })
    })

    it("reads extra sections and the global section", () => {
      const settings = new Settings(rawProject)

      const target = settings.inject({}, { sections: "tasks_parameters", includeGlobal: true })

      expect(target).toEqual({ start: "when_ready", end: "when_done", ...typedProject.general })
    })

    it("works on class instances", () => {
      class Task {
        name = "tasks_parameters"
        start = "later"
      }

      const task = new Settings(rawProject).inject(new Task())

      expect(task.start).toBe("later")
      expect(Reflect.get(task, "end")).toBe("when_done")
    })

    it("overwrites by default when the policy says so", () => {
      const policy = loadPolicy({ overrides: { overwriteAttributes: true } })
      const settings = new Settings({ widget: { foo: 2 } }, { policy })

      expect(settings.inject({ name: "widget", foo: 1 }).foo).toBe(2)
    })

    it("skips sections that do not exist", () => {
      const logger = mock<Logger>()
      logger.child.mockReturnValue(logger)

      const target = new Settings({}, { logger }).inject({ name: "nowhere" })

      expect(target).toEqual({ name: "nowhere" })
      expect(logger.debug).toHaveBeenCalledWith("Inject skipped a missing section", {
        section: "nowhere",
      })
    })
  })

  describe("subset", () => {
    let settings: Settings

    beforeEach(() => {
      settings = new Settings(rawProject)
    })

    it("keeps include keys minus exclude keys", () => {
      const subset = settings.subset({ include: ["general", "files"], exclude: "files" })

      expect([...subset.keys()]).toEqual(["general"])
    })

    it("keeps every key but the excluded ones when include is omitted", () => {
      const subset = settings.subset({ exclude: ["tasks"] })

      expect([...subset.keys()]).toEqual(["general", "files", "tasks_parameters"])
    })

    it("deep-copies values", () => {
      const subset = settings.subset({ include: "general" })

      subset.section("general").seed = 1

      expect(settings.section("general").seed).toBe(43)
    })

    it("does not re-merge class defaults", () => {
      const project = new ProjectSettings(rawProject)

      const subset = project.subset({ include: "files" })

      expect(subset.has("reports")).toBe(false)
      expect(subset.has("files")).toBe(true)
    })

    it("carries bound parsers and provenance", () => {
      const project = new ProjectSettings(rawProject)

      const subset = project.subset({ exclude: "files" })

      expect(subset.view("parameters")).toEqual({
        tasks: { start: "when_ready", end: "when_done" },
      })
      expect(subset.explain("reports")).toBe("defaults")
    })

    it("keeps the store's own class", () => {
      const project = new ProjectSettings({ general: { a: 1 } })

      const subset = project.subset({ include: "general" })

      expect(subset).toBeInstanceOf(ProjectSettings)
      expect(subset.section("general")).toEqual({ verbose: false, log_level: "info", a: 1 })
      expect(subset.has("reports")).toBe(false)
      expect(subset.parameters).toEqual({})
    })

    it("needs include or exclude", () => {
      expect(() => settings.subset({})).toThrow(AmbiguousSubsetRequestError)
    })

    it("raises for an include key that does not exist", () => {
      expect(() => settings.subset({ include: ["general", "missing"] })).toThrow(
        SectionNotFoundError,
      )
    })
  })

  describe("parsers", () => {
    it("binds class-level parsers as typed accessors", () => {
      const project = new ProjectSettings(rawProject)

      expect(project.parameters).toEqual({ tasks: { start: "when_ready", end: "when_done" } })
      expect(project.view("formats")).toEqual({
        files: {
          source: "csv",
          interim: "csv",
          final: "csv",
          analysis: "csv",
          float: "%.4f",
        },
      })
    })

    it("writes through the accessor", () => {
      const project = new ProjectSettings(rawProject)

      project.parameters = { start: "now" }

      expect(project.get("tasks_parameters")).toEqual({ start: "now" })
    })

    it("binds option parsers and narrows with hasBoundViews", () => {
      const settings = new Settings(rawProject, { parsers: projectParsers })

      if (!hasBoundViews(settings, projectParsers)) throw new Error("parsers were not bound")

      expect(settings.key_test).toEqual(["general", "files"])
      expect(settings.format_keys).toEqual({
        files: ["source", "interim", "final", "analysis", "float"],
      })
      expect(settings.files).toEqual(typedProject.files)
    })

    it("hasBoundViews is false for parsers that are not bound", () => {
      const settings = new Settings(rawProject)

      expect(hasBoundViews(settings, projectParsers)).toBe(false)
    })

    it("does not list bound views as own enumerable keys", () => {
      const settings = new Settings(rawProject, { parsers: projectParsers })

      expect(Object.keys(settings)).not.toContain("parameters")
    })

    it("assign() writes through a bound parser by name", () => {
      const settings = new Settings(rawProject, { parsers: projectParsers })

      expect(settings.assign("files", { source_format: "json" })).toBe("files")
      expect(settings.get("files")).toEqual({ source_format: "json" })
    })

    it("bind() adds a view after construction", () => {
      const settings = new Settings(rawProject)

      settings.bind("tasks_view", defineParser({ terms: ["tasks"], shape: "section_contents" }))

      expect(settings.view("tasks_view")).toEqual({ things_to_do: ["stop", "drop", "roll"] })
    })

    it("parse() applies an unbound parser", () => {
      const settings = new Settings(rawProject)

      expect(settings.parse(projectParsers.key_test)).toEqual(["general", "files"])
    })

    it("rejects a binding that collides with a member", () => {
      expect(
        () => new Settings({}, { parsers: { keys: defineParser({ terms: ["general"] }) } }),
      ).toThrow(InvalidParserError)
    })

    it("rejects unknown view names", () => {
      const settings = new Settings(rawProject)

      expect(() => settings.view("missing")).toThrow(InvalidParserError)
      expect(() => settings.assign("missing", {})).toThrow(InvalidParserError)
    })
  })

  describe("provenance", () => {
    it("tells defaults, loaded contents and runtime writes apart", () => {
      const settings = new Settings(typedProject, { defaults: { extra: { a: 1 } } })

      settings.set("added", 1)

      expect(settings.explain("extra")).toBe("defaults")
      expect(settings.explain("files")).toBe("object")
      expect(settings.explain("added")).toBe("runtime")
      expect(settings.sourcesUsed()).toEqual(["defaults", "object", "runtime"])
    })

    it("takes provenance from the caller", () => {
      const settings = new Settings(typedProject, { provenance: { files: "ini:settings.ini" } })

      expect(settings.explain("files")).toBe("ini:settings.ini")
      expect(settings.explain("general")).toBe("object")
    })

    it("throws for sections it does not hold", () => {
      expect(() => new Settings({}).explain("missing")).toThrow(SectionNotFoundError)
    })
  })
})
