import { describe, it, expect } from "vitest";
import { extractFile } from "../../domain/extractors/index.js";

const USER_SERVICE = `package com.acme.service;

import java.util.List;
import static java.util.Collections.emptyList;
import com.acme.model.*;

/**
 * Manages users.
 */
@Service
public class UserService extends BaseService implements Closeable, AutoCloseable {
    public static final int MAX_USERS = 100;
    private final List<String> names = new ArrayList<>();

    public UserService(String name) {
        super(name);
    }

    @Override
    public void close() {
        String local = "x";
    }

    protected <T> List<T> find(String query, int limit) {
        return emptyList();
    }

    public static class Builder {
        private String name;
    }
}

interface Repository {
    void save(String item);
    default int count() { return 0; }
}
`;

describe("Java extractor", () => {
  const result = extractFile(USER_SERVICE, "src/com/acme/service/UserService.java");
  const find = (qualifiedName: string) => result.symbols.find((s) => s.qualifiedName === qualifiedName);

  it("extracts types and members but not locals or instance fields", () => {
    expect(result.language).toBe("java");
    expect(result.warnings).toEqual([]);
    expect(result.symbols.map((s) => `${s.kind} ${s.qualifiedName}`)).toEqual([
      "class UserService",
      "field UserService.MAX_USERS",
      "method UserService.UserService",
      "method UserService.close",
      "method UserService.find",
      "class UserService.Builder",
      "interface Repository",
      "method Repository.save",
      "method Repository.count",
    ]);
  });

  it("records headers, annotations and javadoc", () => {
    const service = find("UserService");
    expect(service?.extends).toEqual(["BaseService"]);
    expect(service?.implements).toEqual(["Closeable", "AutoCloseable"]);
    expect(service?.modifiers).toEqual(["public", "@Service"]);
    expect(service?.docComment).toBe("/**\n * Manages users.\n */");
    expect(service?.range).toEqual({ start: 11, end: 31 });
  });

  it("maps modifiers to shared tags in canonical order", () => {
    expect(find("UserService.MAX_USERS")?.modifiers).toEqual(["public", "static", "final"]);
    expect(find("UserService.close")?.modifiers).toEqual(["public", "override"]);
    expect(find("UserService.UserService")?.modifiers).toEqual(["public", "constructor"]);
    expect(find("Repository.count")?.modifiers).toEqual(["default-method"]);
  });

  it("derives package and interface visibility", () => {
    expect(find("Repository")?.visibility).toBe("package");
    expect(find("Repository.save")?.visibility).toBe("public");
    expect(find("UserService.find")?.visibility).toBe("protected");
    expect(find("UserService.find")?.signature).toBe("protected <T> List<T> find(String query, int limit)");
  });

  it("records single, static and wildcard imports", () => {
    expect(result.imports).toEqual([
      { text: "import java.util.List;", module: "java.util.List", names: ["List"], line: 3 },
      {
        text: "import static java.util.Collections.emptyList;",
        module: "java.util.Collections.emptyList",
        names: ["emptyList"],
        line: 4,
      },
      { text: "import com.acme.model.*;", module: "com.acme.model.*", names: ["*"], line: 5 },
    ]);
  });

  it("qualifies overloads with their parameter lists", () => {
    const source = [
      "class Calc {",
      "    int add(int a, int b) { return a + b; }",
      "    double add(double a, double b) { return a + b; }",
      "}",
      "",
    ].join("\n");
    const ids = extractFile(source, "Calc.java").symbols.map((s) => s.id);
    expect(ids).toEqual([
      "Calc.java#class:Calc",
      "Calc.java#method:Calc.add(int a, int b)",
      "Calc.java#method:Calc.add(double a, double b)",
    ]);
  });

  it("keeps later members after a method with an unclosed parameter list", () => {
    const file = extractFile("class A { void broken(int a { } void ok() {} } class B {}", "A.java");
    expect(file.symbols.map((s) => s.qualifiedName)).toEqual(["A", "A.broken", "A.ok", "B"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unclosed parenthesis in declaration of broken at line 1", line: 1 },
    ]);
  });
});

const USER_REPO = `package com.acme

import com.acme.model.User
import kotlinx.coroutines.*
import com.acme.util.Helper as H

/** A repository. */
data class UserRepo(private val db: Database) : BaseRepo(db), Closeable {
    suspend fun load(id: String): User? {
        return null
    }

    companion object {
        const val TABLE = "users"
    }
}

interface Named {
    val name: String
    fun greet(): String
}

object Registry

fun String.shout(): String = uppercase()

enum class Color { RED, GREEN }
`;

describe("Kotlin extractor", () => {
  const result = extractFile(USER_REPO, "src/com/acme/UserRepo.kt");
  const find = (qualifiedName: string) => result.symbols.find((s) => s.qualifiedName === qualifiedName);

  it("extracts classes, objects, functions and constants", () => {
    expect(result.language).toBe("kotlin");
    expect(result.warnings).toEqual([]);
    expect(result.symbols.map((s) => `${s.kind} ${s.qualifiedName}`)).toEqual([
      "class UserRepo",
      "method UserRepo.load",
      "class UserRepo.Companion",
      "field UserRepo.Companion.TABLE",
      "interface Named",
      "method Named.greet",
      "class Registry",
      "function shout",
      "enum Color",
    ]);
  });

  it("splits supertypes into superclass and interfaces", () => {
    const repo = find("UserRepo");
    expect(repo?.extends).toEqual(["BaseRepo"]);
    expect(repo?.implements).toEqual(["Closeable"]);
    expect(repo?.modifiers).toEqual(["data"]);
    expect(repo?.docComment).toBe("/** A repository. */");
    expect(repo?.range).toEqual({ start: 8, end: 16 });
  });

  it("tags suspend, companion, object and extension declarations", () => {
    expect(find("UserRepo.load")?.modifiers).toEqual(["async"]);
    expect(find("UserRepo.Companion")?.modifiers).toEqual(["companion", "object"]);
    expect(find("Registry")?.modifiers).toEqual(["object"]);
    expect(find("shout")?.modifiers).toEqual(["extension"]);
    expect(find("UserRepo.Companion.TABLE")?.signature).toBe('const val TABLE = "users"');
  });

  it("records imports by their declared name", () => {
    expect(result.imports).toEqual([
      { text: "import com.acme.model.User", module: "com.acme.model.User", names: ["User"], line: 3 },
      { text: "import kotlinx.coroutines.*", module: "kotlinx.coroutines.*", names: ["*"], line: 4 },
      { text: "import com.acme.util.Helper as H", module: "com.acme.util.Helper", names: ["Helper"], line: 5 },
    ]);
  });

  it("reports unclosed blocks at end of file", () => {
    const file = extractFile("class Open {\n    fun run() {\n", "Open.kt");
    expect(file.symbols.map((s) => s.qualifiedName)).toEqual(["Open", "Open.run"]);
    expect(file.warnings).toEqual([
      { code: "parse-recoverable", message: "unexpected end of file: 2 unclosed blocks", line: 3 },
    ]);
  });
});
