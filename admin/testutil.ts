import * as F from "fs";
import * as path from "path";
import Db from "./db";
import * as T from "./types";

const schema = F.readFileSync(path.join(__dirname, "testdata", "schema.sql"), "utf8");

export async function createStore(file = ":memory:"): Promise<Db> {
  let db = await Db.open(file, 'create');
  await db.exec(schema);
  return db;
}

export async function addFeed(db: Db, id: number, url: string, publishedAt: string[]) {
  await db.run("insert into feed (id, url) values (?, ?)", [id, url]);
  for (let i = 0; i < publishedAt.length; i++) {
    await db.run(
      "insert into post (feed_id, title, url, published_at) values (?, ?, ?, ?)",
      [id, `post ${i}`, `https://posts.example/${id}/${i}`, publishedAt[i]]
    );
  }
}

export async function addUser(db: Db, id: number, username: string) {
  await db.run("insert into user (id, username) values (?, ?)", [id, username]);
}

export async function countRows(db: Db, table: string, userId: number): Promise<number> {
  let column = table == "user" ? "id" : "user_id";
  let row = await db.get(`select count(*) as n from ${table} where ${column}=?`, [userId], T.Count);
  return row ? row.n : 0;
}
