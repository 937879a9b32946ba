import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { IBook, IBookFields } from "../../base-data-connector";

export const Book = sequelize.define<Model<IBook, IBookFields>, IBookFields>('book', {
    isbn: { type: DataTypes.STRING(13), allowNull: false, unique: true },
    title: { type: DataTypes.STRING(200), allowNull: false },
    publicationYear: { type: DataTypes.INTEGER, allowNull: true },
    publisher: { type: DataTypes.STRING(100), allowNull: true },
    totalCopies: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 1, validate: { min: 0 } },
    availableCopies: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 1, validate: { min: 0 } },
    categoryId: { type: DataTypes.INTEGER, allowNull: true, references: { model: "categories", key: "id" } },
});
