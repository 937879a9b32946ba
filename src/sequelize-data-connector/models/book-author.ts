import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { IBookAuthor, IBookAuthorFields } from "../../base-data-connector";

export const BookAuthor = sequelize.define<Model<IBookAuthor, IBookAuthorFields>, IBookAuthorFields>('book_author', {
    bookId: { type: DataTypes.INTEGER, allowNull: false, references: { model: "books", key: "id" } },
    authorId: { type: DataTypes.INTEGER, allowNull: false, references: { model: "authors", key: "id" } },
}, {
    indexes: [{ unique: true, fields: ["bookId", "authorId"] }],
});
