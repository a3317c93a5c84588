import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('people', (table) => {
    table.string('nconst', 16).primary() // nm0000001
    table.string('primary_name').notNullable()
    table.integer('birth_year').nullable()
    table.integer('death_year').nullable()
    table.json('primary_professions')
    table.index('primary_name')
  })

  await knex.schema.createTable('movies', (table) => {
    table.string('tconst', 16).primary() // tt0000001
    table.string('title_type', 32).notNullable()
    table.text('primary_title').notNullable()
    table.text('original_title').notNullable()
    table.boolean('is_adult').notNullable().defaultTo(false)
    table.integer('start_year').nullable()
    table.integer('end_year').nullable()
    table.integer('runtime_minutes').nullable()
    table.json('genres')
    table.index('primary_title')
    table.index('title_type')
  })

  await knex.schema.createTable('ratings', (table) => {
    table
      .string('tconst', 16)
      .primary()
      .references('tconst')
      .inTable('movies')
      .onDelete('CASCADE')
    table.decimal('average_rating', 3, 1).nullable() // 0.0-10.0
    table.integer('num_votes').nullable()
    table.index('num_votes')
  })

  await knex.schema.createTable('principals', (table) => {
    table.increments('id').primary()
    table
      .string('tconst', 16)
      .notNullable()
      .references('tconst')
      .inTable('movies')
      .onDelete('CASCADE')
    table
      .string('nconst', 16)
      .notNullable()
      .references('nconst')
      .inTable('people')
      .onDelete('CASCADE')
    table.integer('ordering').notNullable()
    table.string('category', 64).notNullable()
    table.text('job').nullable()
    table.json('characters').nullable()
    table.unique(['tconst', 'nconst', 'ordering', 'category'])
    table.index(['tconst', 'category', 'ordering'])
    table.index('nconst')
  })

  await knex.schema.createTable('import_runs', (table) => {
    table.increments('id').primary()
    table.text('directory').notNullable()
    table
      .enum('status', ['running', 'completed', 'failed'])
      .notNullable()
      .defaultTo('running')
    table.timestamp('started_at').notNullable()
    table.timestamp('finished_at').nullable()
    table.json('summary').nullable()
    table.text('error').nullable()
    table.index('started_at')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('import_runs')
  await knex.schema.dropTableIfExists('principals')
  await knex.schema.dropTableIfExists('ratings')
  await knex.schema.dropTableIfExists('movies')
  await knex.schema.dropTableIfExists('people')
}
